export interface DocumentInput {
  readonly name: string;
  readonly content: string;
  readonly sourceDescription: string;
  readonly referenceTime: Date;
}

export interface ImportSummary {
  readonly imported: number;
  readonly failed: number;
}
