/**
 * Debug Channels
 *
 * Targeted logging of what the reactor decides and why. Complementary to
 * CompileTrace, which records timing and structure.
 *
 * Enable via environment variable:
 * ```bash
 * SCHEMA_REACTOR_DEBUG=sort npm test           # module ordering only
 * SCHEMA_REACTOR_DEBUG=reactor,infer npm test  # several channels
 * SCHEMA_REACTOR_DEBUG=* npm test              # everything
 * ```
 *
 * In code (always present, a no-op when the channel is off):
 * ```typescript
 * debug.infer("action.applied", { action: 3, owner: "import bar" });
 * ```
 */

export const DEBUG_ENV = "SCHEMA_REACTOR_DEBUG";

export type DebugData = Record<string, unknown>;

export type DebugChannel = (point: string, data?: DebugData) => void;

export interface DebugConfig {
  format: "json" | "pretty";
  timestamps: boolean;
  /** Defaults to console.log */
  output: (message: string) => void;
}

const DEFAULT_CONFIG: DebugConfig = {
  format: "pretty",
  timestamps: false,
  output: console.log,
};

let config: DebugConfig = { ...DEFAULT_CONFIG };

function parseDebugEnv(): Set<string> {
  const env = process.env[DEBUG_ENV] ?? "";
  if (!env || env === "0" || env === "false") return new Set();
  if (env === "*" || env === "1" || env === "true") return new Set(["*"]);
  return new Set(env.split(",").map((s) => s.trim().toLowerCase()).filter(Boolean));
}

let enabledChannels = parseDebugEnv();

function isEnabled(channel: string): boolean {
  return enabledChannels.has("*") || enabledChannels.has(channel.toLowerCase());
}

function formatMessage(channel: string, point: string, data: DebugData | undefined): string {
  if (config.format === "json") {
    return JSON.stringify({
      channel,
      point,
      ...(data ? { data } : {}),
      ...(config.timestamps ? { timestamp: Date.now() } : {}),
    });
  }

  const prefix = config.timestamps ? `[${new Date().toISOString()}] ` : "";
  const label = `[${channel}.${point}]`;
  if (!data || Object.keys(data).length === 0) return `${prefix}${label}`;
  const parts = Object.entries(data).map(([key, value]) => `${key}=${formatValue(value)}`);
  return `${prefix}${label} { ${parts.join(", ")} }`;
}

function formatValue(value: unknown): string {
  if (value === null) return "null";
  if (value === undefined) return "undefined";
  if (typeof value === "string") {
    return value.length > 60 ? `"${value.slice(0, 57)}..."` : `"${value}"`;
  }
  if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") {
    return String(value);
  }
  if (Array.isArray(value)) {
    if (value.length === 0) return "[]";
    if (value.length <= 4) return `[${value.map(formatValue).join(", ")}]`;
    return `[${value.length} items]`;
  }
  try {
    return JSON.stringify(value);
  } catch {
    return "[unserializable]";
  }
}

function createChannel(name: string): DebugChannel {
  if (!isEnabled(name)) {
    return () => {};
  }
  return (point: string, data?: DebugData) => {
    config.output(formatMessage(name, point, data));
  };
}

/** Re-read the environment variable and rebuild every channel. */
export function refreshDebugChannels(): void {
  enabledChannels = parseDebugEnv();
  debug.sort = createChannel("sort");
  debug.tree = createChannel("tree");
  debug.reactor = createChannel("reactor");
  debug.infer = createChannel("infer");
  debug.effective = createChannel("effective");
}

export function configureDebug(options: Partial<DebugConfig>): void {
  config = { ...config, ...options };
}

export function isDebugEnabled(channel?: string): boolean {
  if (channel) return isEnabled(channel);
  return enabledChannels.size > 0;
}

export const debug = {
  /** Module graph construction and topological ordering */
  sort: createChannel("sort"),

  /** Statement context tree construction */
  tree: createChannel("tree"),

  /** Phase scheduling and phase completion */
  reactor: createChannel("reactor"),

  /** Prerequisite/action engine */
  infer: createChannel("infer"),

  /** Effective statement materialization */
  effective: createChannel("effective"),
};

export type Debug = typeof debug;
