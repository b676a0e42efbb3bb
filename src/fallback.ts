/**
 * fallback.ts
 * ───────────
 * Canned replies for when the backend is down or misbehaving.
 *
 * Keyword rules run first (whole words, case-insensitive, first match wins).
 * Anything else gets one of the generic replies, picked by a hash of the
 * prompt so the same prompt always gets the same text.
 *
 * fallbackResponse() is total: any string in, a non-empty string out.
 */

export const FALLBACK_MODEL = "fallback-response";

const ECHO_LIMIT = 50;

interface Rule {
  pattern: RegExp;
  reply: () => string;
}

const RULES: Rule[] = [
  {
    pattern: /\b(hello|hi|hey)\b/i,
    reply: () => "Hi there! I'm your local AI assistant, currently answering in offline mode.",
  },
  {
    pattern: /\bwho\b|\bwhat are you\b/i,
    reply: () =>
      "I'm LocalAIHub, your offline AI assistant. The language model isn't reachable right now, so this is a built-in reply.",
  },
  {
    pattern: /\bhelp\b|\bwhat can you do\b/i,
    reply: () =>
      "I can answer questions and help with tasks, all locally for privacy. Start the model server for full answers.",
  },
  {
    pattern: /\btime\b/i,
    reply: () => `It's currently ${formatLocalTime(new Date())}.`,
  },
];

const GENERIC_REPLIES = [
  "I'm running offline right now. You said: '{echo}' - I'll be able to answer properly once the model is back.",
  "The local model isn't available at the moment. I received: '{echo}'",
  "Offline mode: your message '{echo}' was received and logged locally.",
];

export function fallbackResponse(prompt: string): string {
  const rule = RULES.find((r) => r.pattern.test(prompt));
  if (rule) return rule.reply();

  const idx = Math.abs(hashStr(prompt)) % GENERIC_REPLIES.length;
  const template = GENERIC_REPLIES[idx] ?? GENERIC_REPLIES[0] ?? "{echo}";
  return template.replace("{echo}", () => echo(prompt));
}

function echo(prompt: string): string {
  const compact = prompt.replace(/\s+/g, " ").trim();
  if (compact === "") return "(nothing)";
  return compact.length > ECHO_LIMIT ? `${compact.slice(0, ECHO_LIMIT)}...` : compact;
}

function formatLocalTime(d: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ` +
    `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`
  );
}

function hashStr(s: string): number {
  let h = 0;
  for (let i = 0; i < s.length; i++)
    h = (Math.imul(31, h) + s.charCodeAt(i)) | 0;
  return h;
}
