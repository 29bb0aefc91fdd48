/** One rejected item of a batch operation. */
export interface BatchItemFailure {
  id: string;
  code: string;
  message: string;
}

/** Outcome of a batch command: processed items plus per-item rejections. */
export interface BatchReport<T> {
  succeeded: T[];
  failed: BatchItemFailure[];
}
