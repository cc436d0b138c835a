// ═══════════════════════════════════════════════════════════════
// Warden :: Redaction
// Secret scrubbing for anything that leaves the request path
// (turn summaries, audit rows, watchdog payloads).
// ═══════════════════════════════════════════════════════════════

export interface RedactionFinding {
  type: string;
  masked: string;
}

const VALUE_PATTERNS: Array<{ type: string; regex: RegExp }> = [
  { type: 'github_token', regex: /ghp_[A-Za-z0-9]{36}/g },
  { type: 'github_token', regex: /github_pat_[A-Za-z0-9_]{20,}/g },
  { type: 'api_key', regex: /sk-[A-Za-z0-9_-]{20,}/g },
  { type: 'bearer', regex: /Bearer\s+[A-Za-z0-9._~+/-]+=*/g },
  { type: 'jwt', regex: /eyJ[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+/g },
  { type: 'aws_access_key', regex: /AKIA[0-9A-Z]{16}/g },
];

export function maskValue(value: string): string {
  if (value.length <= 8) {
    return '***REDACTED***';
  }
  return `${value.slice(0, 4)}***${value.slice(-4)}`;
}

export function redactText(text: string): { redacted: string; findings: RedactionFinding[] } {
  let redacted = text;
  const findings: RedactionFinding[] = [];
  for (const pattern of VALUE_PATTERNS) {
    redacted = redacted.replace(pattern.regex, match => {
      const masked = maskValue(match);
      findings.push({ type: pattern.type, masked });
      return masked;
    });
  }
  return { redacted, findings };
}
