/** Length in Unicode code points, which is what players perceive as characters. */
export function charLength(text: string): number {
  return Array.from(text).length;
}

/** First `max` code points of `text`. */
export function takeChars(text: string, max: number): string {
  return Array.from(text).slice(0, max).join("");
}

/** `text` cut to `max` code points with an ellipsis when anything was dropped. */
export function preview(text: string, max: number): string {
  return charLength(text) > max ? `${takeChars(text, max)}...` : text;
}

/**
 * Splits text into chunks of at most `chunkSize` characters, preferring
 * line boundaries and hard-splitting only lines that are longer than a chunk.
 */
export function splitText(text: string, chunkSize: number): string[] {
  const chunks: string[] = [];
  let current = "";

  for (const line of text.split("\n")) {
    if (charLength(current) + charLength(line) + 1 <= chunkSize) {
      current += (current ? "\n" : "") + line;
      continue;
    }

    if (current) {
      chunks.push(current);
    }

    const chars = Array.from(line);
    if (chars.length > chunkSize) {
      for (let i = 0; i < chars.length; i += chunkSize) {
        chunks.push(chars.slice(i, i + chunkSize).join(""));
      }
      current = "";
    } else {
      current = line;
    }
  }

  if (current) {
    chunks.push(current);
  }

  return chunks.length > 0 ? chunks : [text];
}

/** Renders a long text as one message, numbering the parts when it had to be split. */
export function formatLongMessage(
  text: string,
  chunkSize: number,
  title?: string,
): string {
  const chunks = splitText(text, chunkSize);
  let result = title ? `==== ${title} ====\n\n` : "";

  if (chunks.length === 1) {
    result += chunks[0] ?? "";
  } else {
    chunks.forEach((chunk, index) => {
      result += `[Part ${index + 1}/${chunks.length}]\n${chunk}\n\n`;
    });
  }

  return result.trim();
}
