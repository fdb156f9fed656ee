export type FileParseResult =
  | { readonly ok: true; readonly text: string }
  | { readonly ok: false; readonly error: string };

/** Downloads an uploaded document and extracts its plain text. */
export interface FileParser {
  parse(url: string, filename: string): Promise<FileParseResult>;
}
