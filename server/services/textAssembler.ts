export interface AssembleOptions {
  /** 1-based page to start from; earlier pages (cover, front matter) are skipped */
  startPage?: number;
}

export function assembleDocumentText(pages: string[], options: AssembleOptions = {}): string {
  const startPage = Math.max(1, Math.floor(options.startPage ?? 1));
  return pages
    .slice(startPage - 1)
    .filter(pageText => pageText.length > 0)
    .join("\n");
}
