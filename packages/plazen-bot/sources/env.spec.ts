import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

const ENV_KEYS = ["PLAZEN_ENV_FILE", "PLAZEN_LOG_LEVEL", "LOG_LEVEL"] as const;

describe("env", () => {
    let tempDir: string;
    let envPath: string;
    const savedEnv = new Map<string, string | undefined>(ENV_KEYS.map((key) => [key, process.env[key]]));

    beforeEach(async () => {
        tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "plazen-env-test-"));
        envPath = path.join(tempDir, ".env");
        await fs.writeFile(envPath, "PLAZEN_LOG_LEVEL=warn\n", "utf8");
        for (const key of ENV_KEYS) {
            delete process.env[key];
        }
    });

    afterEach(async () => {
        for (const [key, value] of savedEnv) {
            if (value === undefined) {
                delete process.env[key];
            } else {
                process.env[key] = value;
            }
        }
        vi.resetModules();
        await fs.rm(tempDir, { recursive: true, force: true });
    });

    it("applies .env log settings before the first logger is created", async () => {
        process.env.PLAZEN_ENV_FILE = envPath;
        vi.resetModules();

        await import("./env.js");
        const { getLogger } = await import("./log.js");

        expect(process.env.PLAZEN_LOG_LEVEL).toBe("warn");
        expect(getLogger("config").level).toBe("warn");
    });

    it("keeps values already set in the environment", async () => {
        const { envLoad } = await import("./env.js");
        process.env.PLAZEN_LOG_LEVEL = "error";

        envLoad(envPath);

        expect(process.env.PLAZEN_LOG_LEVEL).toBe("error");
    });
});
