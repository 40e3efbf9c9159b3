import { z } from "zod";
import { DEFAULT_LIMIT_ERROR_PHRASE, SYNTHETIC_MODEL_NAME } from "./constants.js";
import { createEmptyTokenCounts, type UsageEvent } from "./types.js";

// YYYY-MM-DDTHH:mm:ss[.fff](Z|±HH:MM)
const ISO_TIMESTAMP_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})T\d{2}:\d{2}:\d{2}(\.\d+)?(Z|[+-]\d{2}:\d{2})$/;

const contentPartSchema = z
  .object({
    type: z.string().optional(),
    text: z.string().optional(),
  })
  .passthrough();

/**
 * Zod schema for the usage records Claude Code writes to its JSONL files
 */
export const usageDataSchema = z.object({
  cwd: z.string().optional(),
  sessionId: z.string().optional(),
  timestamp: z.string(),
  version: z.string().optional(),
  type: z.string().optional(),
  message: z.object({
    usage: z.object({
      input_tokens: z.number().nonnegative().optional(),
      output_tokens: z.number().nonnegative().optional(),
      cache_creation_input_tokens: z.number().nonnegative().optional(),
      cache_read_input_tokens: z.number().nonnegative().optional(),
    }),
    model: z.string().optional(),
    id: z.string().optional(), // message id, first half of the identity key
    content: z.union([z.string(), z.array(contentPartSchema)]).optional(),
    costUSD: z.number().optional(),
  }),
  costUSD: z.number().optional(),
  requestId: z.string().optional(), // second half of the identity key
  isApiErrorMessage: z.boolean().optional(),
});

export type UsageData = z.infer<typeof usageDataSchema>;

/**
 * Decides whether a record reports quota exhaustion
 */
export type LimitErrorMatcher = (data: UsageData) => boolean;

/**
 * Derives the deduplication key of a record, or null when it has none
 */
export type IdentityKeyFn = (event: Pick<UsageEvent, "messageId" | "requestId">) => string | null;

export type ParseSkipReason =
  | "empty"
  | "summary"
  | "invalid-json"
  | "invalid-schema"
  | "invalid-timestamp"
  | "missing-tokens"
  | "synthetic-model";

export type ParseResult =
  | { ok: true; event: UsageEvent }
  | { ok: false; reason: ParseSkipReason };

export interface ParseOptions {
  projectName?: string;
  limitErrorMatcher?: LimitErrorMatcher;
}

/**
 * Create a unique identifier for deduplication using message ID and request ID
 */
export const createUniqueHash: IdentityKeyFn = ({ messageId, requestId }) => {
  if (messageId == null || requestId == null) {
    return null;
  }
  return `${messageId}:${requestId}`;
};

function contentTexts(content: UsageData["message"]["content"]): string[] {
  if (content == null) {
    return [];
  }
  if (typeof content === "string") {
    return [content];
  }
  return content.flatMap((part) => (part.text != null ? [part.text] : []));
}

/**
 * Substring match on the error text of API error records
 */
export function createLimitErrorMatcher(
  phrase: string = DEFAULT_LIMIT_ERROR_PHRASE,
): LimitErrorMatcher {
  return (data) =>
    data.isApiErrorMessage === true &&
    contentTexts(data.message.content).some((text) => text.includes(phrase));
}

const defaultLimitErrorMatcher = createLimitErrorMatcher();

/**
 * Parse a strict ISO-8601 timestamp; null when malformed or not a real instant
 */
export function parseTimestamp(value: string): Date | null {
  const match = ISO_TIMESTAMP_PATTERN.exec(value);
  if (match == null) {
    return null;
  }
  const parsed = new Date(value);
  if (Number.isNaN(parsed.getTime())) {
    return null;
  }
  // Date rolls 2025-02-30 over into March; reject instead
  const [, year, month, day] = match;
  const calendar = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  if (
    calendar.getUTCMonth() !== Number(month) - 1 ||
    calendar.getUTCDate() !== Number(day)
  ) {
    return null;
  }
  return parsed;
}

/**
 * Parse one JSONL line into a usage event. Never throws: every rejection is
 * reported as a skip reason.
 */
export function parseUsageLine(line: string, options: ParseOptions = {}): ParseResult {
  const trimmed = line.trim();
  if (trimmed === "") {
    return { ok: false, reason: "empty" };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch {
    return { ok: false, reason: "invalid-json" };
  }

  if (z.object({ type: z.literal("summary") }).safeParse(parsed).success) {
    return { ok: false, reason: "summary" };
  }

  const result = usageDataSchema.safeParse(parsed);
  if (!result.success) {
    return { ok: false, reason: "invalid-schema" };
  }
  const data = result.data;

  const timestamp = parseTimestamp(data.timestamp);
  if (timestamp == null) {
    return { ok: false, reason: "invalid-timestamp" };
  }

  const usage = data.message.usage;
  if (usage.input_tokens == null && usage.output_tokens == null) {
    return { ok: false, reason: "missing-tokens" };
  }

  const limitErrorMatcher = options.limitErrorMatcher ?? defaultLimitErrorMatcher;
  const isLimitError = limitErrorMatcher(data);

  // Synthetic records carry no real usage. A limit error written as one is
  // kept as a zero-usage marker so the session still gets flagged.
  let model = data.message.model ?? null;
  if (model === SYNTHETIC_MODEL_NAME) {
    if (!isLimitError) {
      return { ok: false, reason: "synthetic-model" };
    }
    model = null;
  }
  const counted = model != null || !isLimitError;

  return {
    ok: true,
    event: {
      sessionId: data.sessionId ?? null,
      timestamp,
      model,
      tokens: counted
        ? {
            inputTokens: usage.input_tokens ?? 0,
            outputTokens: usage.output_tokens ?? 0,
            cacheCreationTokens: usage.cache_creation_input_tokens ?? 0,
            cacheReadTokens: usage.cache_read_input_tokens ?? 0,
          }
        : createEmptyTokenCounts(),
      costUSD: counted ? (data.costUSD ?? data.message.costUSD ?? null) : 0,
      isLimitError,
      messageId: data.message.id ?? null,
      requestId: data.requestId ?? null,
      projectName: options.projectName ?? "unknown",
    },
  };
}
