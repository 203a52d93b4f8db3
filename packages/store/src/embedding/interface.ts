export interface EmbeddingProvider {
  readonly name: string;
  /** Length of every vector this provider returns */
  readonly dimensions: number;
  embed(text: string): Promise<number[]>;
  embedBatch(texts: string[]): Promise<number[][]>;
}
