#!/usr/bin/env node
import { parseArgs } from "node:util";
import { loadCodes } from "./code-loader.js";
import { classifyCodes, formatSummary, summarize } from "./report.js";
import { loadConfig } from "../../config/config.js";
import { resolvePrefixRegistry } from "../../config/prefix-registry.js";
import { EIGHT_DIGIT_OVERRIDES } from "../../domain/gtin/gtin.js";
import type { EightDigitOverride } from "../../domain/gtin/gtin.js";

interface CliOptions {
  file: string;
  json: boolean;
  force: EightDigitOverride | undefined;
}

function parseForce(value: string | undefined): EightDigitOverride | undefined {
  if (value === undefined) return undefined;
  const force = EIGHT_DIGIT_OVERRIDES.find((o) => o === value);
  if (!force) {
    console.error(`--force must be one of: ${EIGHT_DIGIT_OVERRIDES.join(", ")}`);
    process.exit(2);
  }
  return force;
}

function parseCliArgs(): CliOptions {
  const { values } = parseArgs({
    options: {
      file: { type: "string", short: "f" },
      json: { type: "boolean", default: false },
      force: { type: "string" },
    },
    strict: true,
  });

  if (!values.file) {
    console.error("Usage: classify-codes --file <codes.txt> [--json] [--force ean8|upce]");
    process.exit(2);
  }

  return {
    file: values.file,
    json: values.json ?? false,
    force: parseForce(values.force),
  };
}

function main(): void {
  const opts = parseCliArgs();
  const config = loadConfig();
  const registry = resolvePrefixRegistry(config.gtin.prefixTablePath);

  const results = classifyCodes(loadCodes(opts.file), opts.force, registry);

  if (opts.json) {
    for (const result of results) {
      console.log(JSON.stringify(result));
    }
  } else {
    console.log(formatSummary(summarize(results)));
  }

  if (results.some((r) => !r.ok)) {
    process.exitCode = 1;
  }
}

main();
