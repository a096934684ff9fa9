// Nothing that reaches a log line may carry an API key, bearer token or signed
// URL credential. When redaction itself fails the message is suppressed.

const REDACTED = "***REDACTED***";

export function redactSecrets(text: string): string {
  let out = text;

  out = out.replace(/(Authorization\s*:\s*Bearer\s+)(\S+)/gi, `$1${REDACTED}`);
  out = out.replace(/\bBearer\s+[A-Za-z0-9\-._~+/]+=*/g, `Bearer ${REDACTED}`);

  out = out.replace(/\bsk-[A-Za-z0-9_-]{10,}/g, REDACTED);
  out = out.replace(/\bAIza[0-9A-Za-z\-_]{20,}/g, REDACTED);
  out = out.replace(/\beyJ[A-Za-z0-9_-]{10,}\.[A-Za-z0-9_-]{10,}\.[A-Za-z0-9_-]+/g, REDACTED);

  out = out.replace(/\b([A-Z0-9_]*(?:API_KEY|SECRET|TOKEN|_KEY))\s*=\s*([^\s"'&]+)/g, `$1=${REDACTED}`);
  out = out.replace(/([?&](?:api_key|apikey|key|access_token|token)=)([^&#\s]+)/gi, `$1${REDACTED}`);

  return out;
}

export function safeRedact(text: string, fallback = "[log message suppressed: redaction failed]"): string {
  try {
    return redactSecrets(text);
  } catch {
    return fallback;
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  if (typeof e === "object" && e !== null && "message" in e && typeof e.message === "string") {
    return e.message;
  }
  return String(e);
}
