export class DocumentStoreError extends Error {
  constructor(
    public readonly operation: string,
    public readonly status: number | undefined,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = DocumentStoreError.name;
  }
}
