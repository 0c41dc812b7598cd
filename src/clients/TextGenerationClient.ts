export type TextGenerationMessage = {
  role: "system" | "user";
  content: string;
};

export interface TextGenerationRequest {
  messages: TextGenerationMessage[];
  temperature: number;
  maxTokens: number;
  /** Overrides the client's configured model. */
  model?: string;
}

export interface ITextGenerationClient {
  /** Backend label used in logs and errors. */
  readonly name: string;
  generate(request: TextGenerationRequest): Promise<string>;
}
