import { injectable } from "tsyringe";
import { mkdir, writeFile } from "fs/promises";
import path from "path";
import { ContentPages } from "../models/PageModel";

export const ARTIFACT_FILES = {
    productPage: "product_page.json",
    faq: "faq.json",
    comparisonPage: "comparison_page.json",
} as const satisfies Record<keyof ContentPages, string>;

export type ArtifactPaths = Record<keyof ContentPages, string>;

@injectable()
export class ArtifactWriter {
    public async write(pages: ContentPages, outDir: string): Promise<ArtifactPaths> {
        await mkdir(outDir, { recursive: true });

        const dump = async (value: unknown, fileName: string): Promise<string> => {
            const target = path.join(outDir, fileName);
            await writeFile(target, JSON.stringify(value, null, 2) + "\n", "utf-8");
            return target;
        };

        const paths: ArtifactPaths = {
            productPage: await dump(pages.productPage, ARTIFACT_FILES.productPage),
            faq: await dump(pages.faq, ARTIFACT_FILES.faq),
            comparisonPage: await dump(pages.comparisonPage, ARTIFACT_FILES.comparisonPage),
        };

        console.log(`[ArtifactWriter] Wrote ${Object.keys(paths).length} artifact(s) to ${outDir}`);
        return paths;
    }
}
