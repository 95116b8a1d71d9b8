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


describe("resolve command", () => {
  it("jumps to the first entity with the name", () => {
    const { stdout, exitCode } = run(["resolve", "door01", "map.yaml", "--format", "json"], FIXTURES);
    expect(exitCode).toBe(0);
    const parsed = JSON.parse(stdout);
    expect(parsed.index).toBe(1);
    expect(parsed.classname).toBe("func_door");
  });

  it("resolves across several lumps", () => {
    const { stdout, exitCode } = run(["resolve", "fog", "map.yaml", "lights.json", "--format", "json"], FIXTURES);
    expect(exitCode).toBe(0);
    const parsed = JSON.parse(stdout);
    expect(parsed.index).toBe(7);
    expect(parsed.source).toBe("lights.json");
  });

  it("names are case-sensitive", () => {
    const { exitCode } = run(["resolve", "DOOR01", "map.yaml"], FIXTURES);
    expect(exitCode).toBe(4);
  });

  it("exits 4 for an unknown name", () => {
    const { exitCode, stderr } = run(["resolve", "missing_light", "map.yaml"], FIXTURES);
    expect(exitCode).toBe(4);
    expect(stderr).toContain('no entity named "missing_light"');
  });

  it("exits 1 for an empty name", () => {
    const { exitCode } = run(["resolve", "", "map.yaml"], FIXTURES);
    expect(exitCode).toBe(1);
  });
});
