export type Config = {
  openaiApiKey?: string;
  openaiBaseUrl?: string;
  openaiModel: string;
  // generation parameters sent with every model call
  maxTokens: number;
  temperature: number;
  maxToolRounds: number; // tool rounds before the tool-free final call
  roundTimeoutMs: number;
  maxResults: number; // search hits handed to the model per call
  maxHistoryExchanges: number; // 0 keeps every exchange
  coursesPath: string;
  host: string;
  port: number;
};

function intFromEnv(name: string, fallback: number, min = 0): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`${name} must be an integer >= ${min}, got '${raw}'`);
  }
  return value;
}

function floatFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`${name} must be a number, got '${raw}'`);
  }
  return value;
}

// Centralized config with sensible defaults; all values can be overridden via env.
export const config: Config = {
  openaiApiKey: process.env.OPENAI_API_KEY,
  openaiBaseUrl: process.env.OPENAI_BASE_URL,
  openaiModel: process.env.OPENAI_MODEL ?? 'gpt-4.1-mini',
  maxTokens: intFromEnv('MAX_TOKENS', 800, 1),
  temperature: floatFromEnv('TEMPERATURE', 0),
  maxToolRounds: intFromEnv('MAX_TOOL_ROUNDS', 2, 1),
  roundTimeoutMs: intFromEnv('ROUND_TIMEOUT_MS', 30000, 1),
  maxResults: intFromEnv('MAX_RESULTS', 5, 1),
  maxHistoryExchanges: intFromEnv('MAX_HISTORY_EXCHANGES', 10),
  coursesPath: process.env.COURSES_PATH ?? 'data/courses.json',
  host: process.env.HOST ?? '0.0.0.0',
  port: intFromEnv('PORT', 8000, 1)
};
