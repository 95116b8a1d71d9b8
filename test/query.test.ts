import { describe, it, expect } from "vitest";
import { execFileSync } from "node:child_process";
import path from "node:path";

const CLI = path.resolve(__dirname, "../src/cli.ts");
const FIXTURES = path.resolve(__dirname, "fixtures");

function run(args: string[], cwd: string): { stdout: string; stderr: string; exitCode: number } {
  try {
    const stdout = execFileSync("npx", ["tsx", CLI, ...args], {
      cwd,
      encoding: "utf-8",
      env: { ...process.env, NO_COLOR: "1" },
      stdio: ["ignore", "pipe", "pipe"],
    });
    return { stdout, stderr: "", exitCode: 0 };
  } catch (err: unknown) {
    const e = err as { stdout: string; stderr: string; status: number };
    return { stdout: e.stdout ?? "", stderr: e.stderr ?? "", exitCode: e.status ?? 1 };
  }
}

describe("query command", () => {
  describe("filters", () => {
    it("lists every entity with no filters", () => {
      const { stdout, exitCode } = run(["query", "map.yaml", "--format", "json"], FIXTURES);
      expect(exitCode).toBe(0);
      const parsed = JSON.parse(stdout);
      expect(parsed.results.length).toBe(6);
      expect(parsed.meta).toEqual({ total_count: 6, matched_count: 6 });
      expect(parsed.results.map((r: { index: number }) => r.index)).toEqual([0, 1, 2, 3, 4, 5]);
    });

    it("filters by classname substring", () => {
      const { stdout, exitCode } = run(["query", "map.yaml", "-c", "PROP", "--format", "json"], FIXTURES);
      expect(exitCode).toBe(0);
      const parsed = JSON.parse(stdout);
      expect(parsed.results).toEqual([
        { index: 3, classname: "prop_physics", targetname: "crate01" },
        { index: 5, classname: "prop_dynamic", targetname: "door01" },
      ]);
    });

    it("filters by object kind", () => {
      expect(run(["query", "map.yaml", "--kind", "mesh", "--count"], FIXTURES).stdout.trim()).toBe("3");
      expect(run(["query", "map.yaml", "--kind", "point", "--count"], FIXTURES).stdout.trim()).toBe("3");
    });

    it("matches key and value on the same property", () => {
      const { stdout } = run(
        ["query", "map.yaml", "-k", "target", "-v", "door01", "--exact", "--format", "json"],
        FIXTURES,
      );
      const parsed = JSON.parse(stdout);
      expect(parsed.results.map((r: { index: number }) => r.index)).toEqual([1, 5]);

      const mismatch = run(["query", "map.yaml", "-k", "health", "-v", "door01", "--format", "json"], FIXTURES);
      expect(JSON.parse(mismatch.stdout).results).toEqual([]);
    });

    it("whole-value matching rejects a prefix", () => {
      const { stdout } = run(["query", "map.yaml", "-v", "door0", "--exact", "--count"], FIXTURES);
      expect(stdout.trim()).toBe("0");
    });

    it("limits results", () => {
      const { stdout } = run(["query", "map.yaml", "--limit", "2", "--format", "json"], FIXTURES);
      expect(JSON.parse(stdout).results.length).toBe(2);
    });
  });

  describe("formats", () => {
    it("csv", () => {
      const { stdout, exitCode } = run(["query", "map.yaml", "-c", "relay", "--format", "csv"], FIXTURES);
      expect(exitCode).toBe(0);
      expect(stdout.trim().split("\n")).toEqual(["index,classname,targetname", "2,logic_relay,relay_open"]);
    });

    it("jsonl with sources across several lumps", () => {
      const { stdout, exitCode } = run(
        ["query", "map.yaml", "lights.json", "-c", "light", "--source", "--format", "jsonl"],
        FIXTURES,
      );
      expect(exitCode).toBe(0);
      expect(stdout.trim()).toBe(
        '{"index":6,"classname":"light_spot","targetname":"lamp01","source":"lights.json"}',
      );
    });

    it("table", () => {
      const { stdout, exitCode } = run(["query", "map.yaml", "--kind", "mesh"], FIXTURES);
      expect(exitCode).toBe(0);
      expect(stdout).toContain("classname");
      expect(stdout).toContain("func_door");
      expect(stdout).toContain("Showing 3 of 6 entities");
    });
  });

  describe("error handling", () => {
    it("exits 1 for an unknown kind", () => {
      const { exitCode, stderr } = run(["query", "map.yaml", "--kind", "brush"], FIXTURES);
      expect(exitCode).toBe(1);
      expect(stderr).toContain("invalid --kind: brush");
    });

    it("exits 1 for an unknown format", () => {
      const { exitCode } = run(["query", "map.yaml", "--format", "xml"], FIXTURES);
      expect(exitCode).toBe(1);
    });

    it("exits 4 for a missing file", () => {
      const { exitCode, stdout } = run(["query", "missing.yaml", "--format", "json"], FIXTURES);
      expect(exitCode).toBe(4);
      expect(JSON.parse(stdout).error.code).toBe("file_not_found");
    });

    it("exits 3 for an unreadable document", () => {
      const { exitCode, stderr } = run(["query", "invalid.yaml"], FIXTURES);
      expect(exitCode).toBe(3);
      expect(stderr).toContain("invalid.yaml");
    });
  });
});
