import { inject, injectable } from "tsyringe";
import { CanonicalProductModel } from "../models/CanonicalProductModel";
import { ComparisonResult } from "../models/ComparisonModel";
import { FaqItem, Question } from "../models/FaqModel";
import { ContentPages } from "../models/PageModel";
import { IParaphraser } from "../interfaces/IParaphraser";
import { ProductRecordBuilder } from "./ProductRecordBuilder";
import { QuestionGeneratorService } from "./QuestionGeneratorService";
import { FaqAnswerService } from "./FaqAnswerService";
import { ComparisonService } from "./ComparisonService";
import { PageBuilderService } from "./PageBuilderService";

export type PipelineResult = {
    record: CanonicalProductModel;
    faqItems: FaqItem[];
    comparison: ComparisonResult;
    pages: ContentPages;
};

@injectable()
export class ContentPipelineService {
    constructor(
        @inject(ProductRecordBuilder) private readonly recordBuilder: ProductRecordBuilder,
        @inject(QuestionGeneratorService) private readonly questionGenerator: QuestionGeneratorService,
        @inject(FaqAnswerService) private readonly faqAnswerService: FaqAnswerService,
        @inject(ComparisonService) private readonly comparisonService: ComparisonService,
        @inject(PageBuilderService) private readonly pageBuilder: PageBuilderService,
        @inject("IParaphraser") private readonly paraphraser: IParaphraser
    ) {}

    /**
     * Runs one product through every stage. Only a `ValidationError` from the record
     * builder escapes; the paraphrase stage falls back to the template answers.
     */
    public async run(raw: unknown, questions?: readonly Question[]): Promise<PipelineResult> {
        const record = this.recordBuilder.build(raw);
        console.log(`[ContentPipelineService] Built record ${record.id} (${record.name})`);

        const batch = questions ?? this.questionGenerator.generate(record);
        const answered = this.faqAnswerService.answerAll(batch, record);
        const comparison = this.comparisonService.compare(record);
        const faqItems = await this.paraphraser.paraphrase(answered, record);

        const pages: ContentPages = {
            productPage: this.pageBuilder.buildProductPage(record),
            faq: this.pageBuilder.buildFaqPage(record, faqItems),
            comparisonPage: this.pageBuilder.buildComparisonPage(record, comparison),
        };

        console.log(
            `[ContentPipelineService] Finished ${record.id}: ${faqItems.length} FAQ item(s), comparator ${comparison.productB.id}`
        );
        return { record, faqItems, comparison, pages };
    }
}
