export type DebugFlag = "net" | "conn" | "proxy" | "echo";

/**
 * Debug configuration value
 *
 * - `true`: enable all components
 * - `false`: disable all components
 * - `string[]`: enable selected components
 *
 * When left undefined the `TCPCONN_DEBUG` environment variable decides.
 */
export type DebugConfig = boolean | ReadonlyArray<DebugFlag>;

export const ALL_DEBUG_FLAGS: ReadonlyArray<DebugFlag> = ["net", "conn", "proxy", "echo"];

export type DebugLogFn = (component: DebugFlag, message: string) => void;

export type DebugOptions = {
  debug?: DebugConfig;
  debugLog?: DebugLogFn;
};

export type Logger = (component: DebugFlag, message: string) => void;

export function defaultDebugLog(component: DebugFlag, message: string) {
  console.log(formatDebugLine(component, message));
}

export function formatDebugLine(component: DebugFlag, message: string) {
  return `[${component}] ${stripTrailingNewline(message)}`;
}

export function stripTrailingNewline(value: string) {
  if (value.endsWith("\r\n")) return value.slice(0, -2);
  if (value.endsWith("\n")) return value.slice(0, -1);
  return value;
}

function isDebugFlag(value: string): value is DebugFlag {
  return ALL_DEBUG_FLAGS.some((flag) => flag === value);
}

export function parseDebugEnv(value: string | undefined = process.env.TCPCONN_DEBUG) {
  const flags = new Set<DebugFlag>();
  if (!value) return flags;

  // "net,proxy" as well as "all" / "*"
  for (const entry of value.split(",")) {
    const raw = entry.trim();
    if (!raw) continue;

    if (raw === "*" || raw === "all" || raw === "1" || raw === "true") {
      for (const f of ALL_DEBUG_FLAGS) flags.add(f);
      continue;
    }
    if (isDebugFlag(raw)) {
      flags.add(raw);
    }
  }

  return flags;
}

export function resolveDebugFlags(config: DebugConfig | undefined, envFlags = parseDebugEnv()) {
  if (config === undefined) {
    return envFlags;
  }
  if (config === true) {
    return new Set<DebugFlag>(ALL_DEBUG_FLAGS);
  }
  if (config === false) {
    return new Set<DebugFlag>();
  }
  return new Set<DebugFlag>(config.filter(isDebugFlag));
}

export function createLogger(options: DebugOptions = {}): Logger {
  const flags = resolveDebugFlags(options.debug);
  const log = options.debugLog ?? defaultDebugLog;
  return (component, message) => {
    if (flags.has(component)) {
      log(component, message);
    }
  };
}
