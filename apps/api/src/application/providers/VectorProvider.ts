export interface VectorProvider {
    /** One vector per input text, in input order. */
    generateEmbeddings(texts: string[]): Promise<number[][]>;
}
