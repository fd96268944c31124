export interface RawDocument {
  title: string;
  body: string;
}

/**
 * Where raw documents come from. `fetch` rejects with a FetchError when the
 * source id cannot be read; the caller treats that as zero documents.
 */
export interface DocumentSource {
  /** recorded as the `source` of every persisted TrendRecord */
  readonly name: string;
  fetch(sourceId: string): Promise<RawDocument[]>;
}
