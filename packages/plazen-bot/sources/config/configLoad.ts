import { freezeDeep } from "../util/freezeDeep.js";
import { configParse } from "./configParse.js";
import type { Config, ConfigEnv } from "./configTypes.js";

/**
 * Returns an immutable Config from the environment. `.env` is already applied by env.ts.
 */
export function configLoad(env: ConfigEnv = process.env): Config {
    return freezeDeep(configParse(env));
}
