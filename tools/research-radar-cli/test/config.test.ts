import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";

import { makeTempDir, removeTempDirs } from "@/tests-ts/helpers/fixtures";
import { parseBoundedInt, resolveConfigPath, resolveSettings } from "../src/config";
import { CliError } from "../src/errors";

const ORIGINAL_ENV = { ...process.env };

afterEach(async () => {
  process.env = { ...ORIGINAL_ENV };
  await removeTempDirs();
});

describe("config", () => {
  it("prefers the option, then RADAR_CONFIG, then config.yaml", () => {
    process.env.RADAR_CONFIG = "/etc/radar.yaml";
    expect(resolveConfigPath({ config: " ./local.yaml " })).toBe("./local.yaml");
    expect(resolveConfigPath({})).toBe("/etc/radar.yaml");

    delete process.env.RADAR_CONFIG;
    expect(resolveConfigPath({})).toBe("config.yaml");
  });

  it("parses bounded integers", () => {
    expect(parseBoundedInt("days", "7", 1, 365)).toBe(7);
    expect(() => parseBoundedInt("days", "soon", 1, 365)).toThrowError(/not a valid integer/);
    expect(() => parseBoundedInt("days", 0, 1, 365)).toThrowError("days must be within 1-365: 0");
  });

  it("maps invalid yaml to a configuration error", async () => {
    const root = await makeTempDir("radar-cli");
    const configPath = path.join(root, "config.yaml");
    await fs.writeFile(configPath, "claude: [unclosed\n", "utf-8");

    let caught: unknown;
    try {
      resolveSettings({ config: configPath });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(CliError);
    expect(caught instanceof CliError ? caught.code : 0).toBe(2);
    expect(caught instanceof CliError ? caught.hint : "").toBe(`Check ${configPath}`);
  });
});
