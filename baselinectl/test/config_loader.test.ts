import { describe, expect, it, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { CONFIG_DIR as DEFAULT_CONFIG_DIR, loadConfig, loadConfigDocument } from "../src/config/loader.js";
import { validateConfig } from "../src/config/validator.js";
import { ConfigInvalidError } from "../src/errors.js";

const CONFIG_DIR = path.resolve(import.meta.dirname, "../config");

describe("config loader", () => {
  it("defaults to the package's config directory", () => {
    expect(DEFAULT_CONFIG_DIR).toBe(CONFIG_DIR);
    expect(loadConfig({ env: {} })).toEqual(loadConfig({ configDir: CONFIG_DIR, env: {} }));
  });

  it("loads base config with all required fields", () => {
    const config = loadConfig({ configDir: CONFIG_DIR, env: {} });
    expect(config.schema_version).toBe("1.0.0");
    expect(config.report_dir).toBe("reports");
    expect(config.tolerances.geometry_epsilon).toBe(0.01);
    expect(config.interfaces.max_components).toBe(500);
    expect(config.compliance.max_depth).toBe(10);
    expect(config.extractor_command).toBeUndefined();
  });

  it("merges an overlay over base, replacing arrays", () => {
    const config = loadConfig({ configDir: CONFIG_DIR, envName: "strict", env: {} });
    expect(config.tolerances.envelope).toBe(0.05);
    // untouched keys survive the merge
    expect(config.tolerances.hole_position).toBe(0.5);
    expect(config.compliance.valid_schemas).toEqual(["AP214"]);
  });

  it("lets the large-assembly overlay raise the scan limit", () => {
    const config = loadConfig({ configDir: CONFIG_DIR, envName: "large-assembly", env: {} });
    expect(config.interfaces.max_components).toBe(2000);
    expect(config.interfaces.time_budget_ms).toBe(60000);
    expect(config.interfaces.contact_ratio).toBe(0.3);
  });

  it("applies environment variable overrides", () => {
    const config = loadConfig({
      configDir: CONFIG_DIR,
      env: { BASELINECTL_REPORT_DIR: "/tmp/override", BASELINECTL_EXTRACTOR_ARGS: "--json  --quiet", HOME: "/root" },
    });
    expect(config.report_dir).toBe("/tmp/override");
    expect(config.extractor_args).toEqual(["--json", "--quiet"]);
  });

  it("rejects an overlay that does not exist", () => {
    expect(() => loadConfig({ configDir: CONFIG_DIR, envName: "nonexistent", env: {} })).toThrow(ConfigInvalidError);
  });

  describe("with a scratch config dir", () => {
    let tmpDir: string;

    beforeEach(() => {
      tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "baselinectl-config-"));
    });

    afterEach(() => {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it("falls back to built-in defaults without any yaml", () => {
      const config = loadConfig({ configDir: tmpDir, env: {} });
      expect(config.tolerances.hole_diameter).toBe(0.1);
      expect(config.interfaces.reject_ratio).toBe(2);
    });

    it("reports out-of-range values", () => {
      fs.writeFileSync(path.join(tmpDir, "base.yaml"), "tolerances:\n  envelope: -1\n");
      expect(() => loadConfig({ configDir: tmpDir, env: {} })).toThrow(/tolerances\/envelope must be >= 0/);
    });

    it("rejects a yaml file that is not a mapping", () => {
      fs.writeFileSync(path.join(tmpDir, "base.yaml"), "- just\n- a list\n");
      expect(() => loadConfigDocument({ configDir: tmpDir, env: {} })).toThrow("must contain a mapping");
    });
  });
});

describe("config validator", () => {
  it("validates the merged base config", () => {
    const result = validateConfig(loadConfigDocument({ configDir: CONFIG_DIR, env: {} }));
    expect(result.ok).toBe(true);
  });

  it("rejects config missing required fields", () => {
    const result = validateConfig({ schema_version: "1.0.0" });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.errors).toContain("must have required property 'report_dir'");
  });

  it("rejects a non-integer component limit", () => {
    const doc = loadConfigDocument({ configDir: CONFIG_DIR, env: {} });
    const interfaces = typeof doc.interfaces === "object" && doc.interfaces !== null ? doc.interfaces : {};
    const result = validateConfig({ ...doc, interfaces: { ...interfaces, max_components: 2.5 } });
    expect(result.ok).toBe(false);
  });
});
