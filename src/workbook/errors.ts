export class WorkbookReadError extends Error {
  constructor(
    readonly path: string,
    options?: { cause?: unknown },
  ) {
    super(`Could not read workbook at ${path}`, options);
    this.name = 'WorkbookReadError';
  }
}

export class WorkbookDownloadError extends Error {
  constructor(
    readonly url: string,
    readonly status: number | null,
    options?: { cause?: unknown },
  ) {
    super(
      status === null
        ? `Workbook download from ${url} failed`
        : `Workbook download from ${url} returned HTTP ${status}`,
      options,
    );
    this.name = 'WorkbookDownloadError';
  }
}
