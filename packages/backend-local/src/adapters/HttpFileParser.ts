import mammoth from "mammoth";
import { extname } from "node:path";

import { CollaboratorFailure } from "../core.js";
import type { FileParser, FileParseResult, Logger } from "../core.js";

interface HttpFileParserOptions {
  readonly maxBytes?: number;
  readonly timeoutMs?: number;
  readonly logger?: Logger;
}

export const SUPPORTED_EXTENSIONS = [".txt", ".md", ".docx"] as const;

type SupportedExtension = (typeof SUPPORTED_EXTENSIONS)[number];

function isSupported(extension: string): extension is SupportedExtension {
  return SUPPORTED_EXTENSIONS.some((supported) => supported === extension);
}

/** Downloads an attachment and extracts plain text from .txt, .md and .docx files. */
export class HttpFileParser implements FileParser {
  readonly #maxBytes: number;
  readonly #timeoutMs: number;
  readonly #logger: Logger | undefined;

  constructor({ maxBytes = 5 * 1024 * 1024, timeoutMs = 30_000, logger }: HttpFileParserOptions = {}) {
    this.#maxBytes = maxBytes;
    this.#timeoutMs = timeoutMs;
    this.#logger = logger;
  }

  async parse(url: string, filename: string): Promise<FileParseResult> {
    const extension = extname(filename).toLowerCase();
    if (!isSupported(extension)) {
      return {
        ok: false,
        error: `Unsupported file type "${extension || filename}"; use ${SUPPORTED_EXTENSIONS.join(", ")}`,
      };
    }

    let buffer: Buffer;
    try {
      const response = await fetch(url, { signal: AbortSignal.timeout(this.#timeoutMs) });
      if (!response.ok) {
        return { ok: false, error: `Download failed: HTTP ${response.status}` };
      }
      buffer = Buffer.from(await response.arrayBuffer());
    } catch (cause) {
      const failure = new CollaboratorFailure("file-parser", "Download failed", { cause });
      this.#logger?.warn(failure.message, { filename, error: failure.cause });
      return { ok: false, error: failure.message };
    }

    if (buffer.byteLength > this.#maxBytes) {
      return { ok: false, error: `The file is larger than ${this.#maxBytes} bytes` };
    }

    let text: string;
    try {
      text = extension === ".docx" ? (await mammoth.extractRawText({ buffer })).value : decodeText(buffer);
    } catch (cause) {
      const failure = new CollaboratorFailure("file-parser", "Could not extract text", { cause });
      this.#logger?.warn(failure.message, { filename, error: failure.cause });
      return { ok: false, error: failure.message };
    }

    const trimmed = text.trim();
    if (!trimmed) {
      return { ok: false, error: "The file is empty" };
    }

    this.#logger?.info("File parsed", { filename, length: trimmed.length });
    return { ok: true, text: trimmed };
  }
}

/** UTF-8 first (BOM dropped), then GB18030 for legacy Chinese text files. */
export function decodeText(buffer: Uint8Array): string {
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(buffer);
  } catch {
    return new TextDecoder("gb18030").decode(buffer);
  }
}
