// ═══════════════════════════════════════════════════════════════
// Warden :: Text Helpers
// Code-point compaction and UTF-8 byte truncation
// ═══════════════════════════════════════════════════════════════

import { redactText } from './redact.js';

const ELLIPSIS = '…';

/** Collapse whitespace and cap at `maxChars` code points (ellipsis included). */
export function compact(text: string, maxChars: number): string {
  const collapsed = text.replace(/\s+/g, ' ').trim();
  const chars = Array.from(collapsed);
  if (chars.length <= maxChars) return collapsed;
  if (maxChars <= 0) return '';
  return chars.slice(0, maxChars - 1).join('') + ELLIPSIS;
}

/** Redact secrets, then compact. Used for every summary that is stored or forwarded. */
export function summarize(text: string, maxChars: number): string {
  return compact(redactText(text).redacted, maxChars);
}

export function byteLength(text: string): number {
  return Buffer.byteLength(text, 'utf8');
}

/** Cut to at most `maxBytes` UTF-8 bytes without splitting a code point. */
export function truncateBytes(text: string, maxBytes: number): { text: string; truncated: boolean } {
  if (byteLength(text) <= maxBytes) return { text, truncated: false };
  let used = 0;
  let out = '';
  for (const ch of text) {
    const size = byteLength(ch);
    if (used + size > maxBytes) break;
    used += size;
    out += ch;
  }
  return { text: out, truncated: true };
}
