// Likely credentials that must never leave the machine inside a prompt
const SENSITIVE_PATTERNS = [
  /(api[_-]?key|token|secret|password|pwd)\s*[:=]\s*['"]?[a-zA-Z0-9+/=_-]{20,}['"]?/gi,
  /https?:\/\/[^:\s/]+:[^@\s]+@[^\s]+/g,
  /(mongodb|postgres(?:ql)?|mysql|redis|amqp):\/\/[^\s]+/gi,
  /eyJ[a-zA-Z0-9_-]+\.[a-zA-Z0-9_-]+\.[a-zA-Z0-9_-]+/g,
  /AKIA[0-9A-Z]{16}/g,
  /-----BEGIN\s+(?:RSA\s+|EC\s+|OPENSSH\s+)?PRIVATE\s+KEY-----[\s\S]*?-----END\s+(?:RSA\s+|EC\s+|OPENSSH\s+)?PRIVATE\s+KEY-----/g,
];

export const REDACTED = '[REDACTED]';

export const sanitizeDiffContent = (content: string): { sanitized: string; warnings: string[] } => {
  const warnings: string[] = [];
  let sanitized = content;

  for (const pattern of SENSITIVE_PATTERNS) {
    const matches = sanitized.match(pattern);
    if (matches) {
      warnings.push(`Redacted ${matches.length} potential secret(s) matching ${pattern.source.slice(0, 24)}...`);
      sanitized = sanitized.replace(pattern, REDACTED);
    }
  }

  return { sanitized, warnings };
};
