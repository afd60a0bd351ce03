const encoder = new TextEncoder();
const decoder = new TextDecoder('utf-8');

// Whitespace, C0/C1 controls (NEL included) and the Unicode line/paragraph separators.
const LINE_BREAKING = /[\s\p{Cc}]+/gu;

/** Longest prefix of `text` that fits in `maxBytes` of UTF-8; never splits a code point. */
export function truncateUtf8(text: string, maxBytes: number): string {
  if (!Number.isInteger(maxBytes) || maxBytes <= 0) return '';
  const buf = new Uint8Array(maxBytes);
  const { read, written } = encoder.encodeInto(text, buf);
  return read === text.length ? text : decoder.decode(buf.subarray(0, written));
}

/** Collapses runs of whitespace and control characters to one space, then truncates. */
export function formatOneLineUtf8(input: unknown, maxBytes: number): string {
  const line = String(input ?? '').replace(LINE_BREAKING, ' ').trim();
  return truncateUtf8(line, maxBytes).trimEnd();
}

function messageOf(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'object' && err !== null) return 'Error';
  return String(err);
}

/** Single-line rendering of a thrown value for structured log fields. */
export function formatOneLineError(err: unknown, maxBytes: number, fallback = 'Error'): string {
  return formatOneLineUtf8(messageOf(err), maxBytes) || fallback;
}
