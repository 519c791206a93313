#!/usr/bin/env node
/**
 * netwatch-check [config.json]: run one connectivity check and print
 * "Yes Internet" or "No Internet [code]". Exits 0 when online, 1 otherwise.
 */

import { loadConfig } from "./config.js";
import { checkOnce, formatCheckResult } from "./check-once.js";
import { defaultRegistry } from "./probes.js";

async function main(): Promise<number> {
  const config = loadConfig(process.argv[2]);
  const result = await checkOnce(defaultRegistry(config.probeTimeoutMs));
  console.log(formatCheckResult(result));
  return result.ok ? 0 : 1;
}

main().then(
  (code) => process.exit(code),
  (err) => {
    console.error("[netwatch] Check failed:", err);
    process.exit(2);
  },
);
