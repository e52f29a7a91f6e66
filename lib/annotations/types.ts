export interface AnnotationRecord {
  readonly bookTitle: string;
  readonly page: string;
  readonly quote: string;
  readonly note: string;
}

export interface BookGroup {
  readonly title: string;
  readonly records: readonly AnnotationRecord[];
}
