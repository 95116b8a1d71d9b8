import { describe, it, expect } from "vitest";
import { execFileSync } from "node:child_process";
import path from "node:path";
import { createEntity } from "../src/entities/entity.js";
import { collectStats } from "../src/commands/stats.js";

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


describe("collectStats", () => {
  it("counts classnames that match Object members", () => {
    const entities = ["constructor", "toString", "constructor"].map((classname) =>
      createEntity({ properties: { classname } }),
    );
    const stats = collectStats(entities, 1);
    expect(stats.by_classname).toEqual({ constructor: 2, toString: 1 });
    expect(Object.keys(stats.by_classname)).toEqual(["constructor", "toString"]);
  });
});

describe("stats command", () => {
  it("returns entity statistics (JSON)", () => {
    const { stdout, exitCode } = run(["stats", "map.yaml", "--format", "json"], FIXTURES);
    expect(exitCode).toBe(0);
    expect(JSON.parse(stdout)).toEqual({
      total_entities: 6,
      lumps: 1,
      mesh_entities: 3,
      point_entities: 3,
      by_classname: {
        func_door: 1,
        info_player_start: 1,
        logic_relay: 1,
        prop_dynamic: 1,
        prop_physics: 1,
        worldspawn: 1,
      },
      with_outputs: 2,
      connections: 3,
      broken_connections: 1,
      duplicate_targetnames: { door01: 2 },
    });
  });

  it("counts every lump", () => {
    const { stdout } = run(["stats", "map.yaml", "lights.json", "--format", "json"], FIXTURES);
    const parsed = JSON.parse(stdout);
    expect(parsed.total_entities).toBe(8);
    expect(parsed.lumps).toBe(2);
  });

  it("text format shows stats", () => {
    const { stdout, exitCode } = run(["stats", "map.yaml"], FIXTURES);
    expect(exitCode).toBe(0);
    expect(stdout).toContain("Entity Stats");
    expect(stdout).toContain("Entities:     6");
    expect(stdout).toContain("Shared targetnames");
  });

  it("exits 4 for a missing file", () => {
    const { exitCode } = run(["stats", "missing.yaml"], FIXTURES);
    expect(exitCode).toBe(4);
  });
});
