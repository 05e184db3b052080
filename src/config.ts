/**
 * Runtime configuration, read from the environment on first use.
 *
 *   TENSORGRAPH_DEBUG=1        log graph mutations (create, erase, clone)
 *   TENSORGRAPH_SEED=<int>     default seed for Variable payload initialisation
 *   TENSORGRAPH_VERIFY_DUMP=0  skip the function dump on verification failure
 */

export type GraphConfig = {
  debug: boolean;
  seed: number;
  verifyDump: boolean;
};

function readEnv(name: string): string | undefined {
  return typeof process !== "undefined" ? process.env?.[name] : undefined;
}

function parseSeed(raw: string | undefined): number {
  if (raw === undefined || raw === "") return 0;
  const seed = parseInt(raw, 10);
  if (!Number.isFinite(seed)) {
    console.warn(`[tensorgraph:config] ignoring non-integer TENSORGRAPH_SEED="${raw}"`);
    return 0;
  }
  return seed;
}

export function loadGraphConfigFromEnv(): GraphConfig {
  return {
    debug: readEnv("TENSORGRAPH_DEBUG") === "1",
    seed: parseSeed(readEnv("TENSORGRAPH_SEED")),
    verifyDump: readEnv("TENSORGRAPH_VERIFY_DUMP") !== "0",
  };
}

let current: GraphConfig | null = null;

export function getGraphConfig(): GraphConfig {
  if (!current) {
    current = loadGraphConfigFromEnv();
  }
  return current;
}

export function setGraphConfig(overrides: Partial<GraphConfig>): void {
  current = { ...getGraphConfig(), ...overrides };
}

export function resetGraphConfig(): void {
  current = null;
}
