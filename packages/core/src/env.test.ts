import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { loadEnvFiles } from "./env";

describe("loadEnvFiles", () => {
	const savedEnv = { ...process.env };
	const dirs: string[] = [];

	afterEach(() => {
		process.env = { ...savedEnv };
		for (const dir of dirs.splice(0)) {
			fs.rmSync(dir, { recursive: true, force: true });
		}
	});

	it("loads .env then .env.local, later files winning, each only once", () => {
		delete process.env.INDICORE_ENV_FILE;
		const dir = fs.mkdtempSync(path.join(os.tmpdir(), "indicore-env-"));
		dirs.push(dir);
		fs.writeFileSync(path.join(dir, ".env"), "INDICORE_TEST_VALUE=from-env\nINDICORE_TEST_BASE=base\n");
		fs.writeFileSync(path.join(dir, ".env.local"), "INDICORE_TEST_VALUE=from-local\n");

		expect(loadEnvFiles(dir)).toEqual([path.join(dir, ".env"), path.join(dir, ".env.local")]);
		expect(process.env.INDICORE_TEST_VALUE).toBe("from-local");
		expect(process.env.INDICORE_TEST_BASE).toBe("base");
		expect(loadEnvFiles(dir)).toEqual([]);
	});

	it("loads the file named by INDICORE_ENV_FILE first", () => {
		const dir = fs.mkdtempSync(path.join(os.tmpdir(), "indicore-env-"));
		dirs.push(dir);
		fs.writeFileSync(path.join(dir, "custom.env"), "INDICORE_TEST_CUSTOM=yes\n");
		process.env.INDICORE_ENV_FILE = "custom.env";

		expect(loadEnvFiles(dir)).toEqual([path.join(dir, "custom.env")]);
		expect(process.env.INDICORE_TEST_CUSTOM).toBe("yes");
	});
});
