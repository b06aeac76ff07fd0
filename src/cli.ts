#!/usr/bin/env node
/**
 * Generate the JSON databases of one game data version.
 *
 * Usage: npm run generate -- --generate armaments talismans --gamedata-version 1.02.3
 *        npm run generate -- --find-values EquipParamGoods:goodsType --find-values-limit 3
 */

import config from "./config/env.js";
import { ArgumentError, ErdbError } from "./errors.js";
import { USAGE } from "./cli/args.js";
import { run } from "./cli/run.js";
import logger from "./logger.js";

try {
  run(process.argv.slice(2), config);
} catch (error) {
  if (error instanceof ErdbError) {
    logger.fatal(error.toJSON(), error.message);
    if (error instanceof ArgumentError) console.error(USAGE);
  } else {
    logger.fatal({ err: error }, "Generation failed");
  }
  process.exitCode = 1;
}
