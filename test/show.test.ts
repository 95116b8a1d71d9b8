import { describe, it, expect, vi } from "vitest";
import { execFileSync } from "node:child_process";
import path from "node:path";
import { createEntity } from "../src/entities/entity.js";
import { printEntity } from "../src/commands/show.js";

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


describe("show command", () => {
  it("shows an entity by index as JSON", () => {
    const { stdout, exitCode } = run(["show", "map.yaml", "--index", "1", "--format", "json"], FIXTURES);
    expect(exitCode).toBe(0);
    const parsed = JSON.parse(stdout);
    expect(parsed.index).toBe(1);
    expect(parsed.title).toBe("Entity Properties - door01 - Entity Lump: maps/test/entities/default_ents.vents");
    expect(parsed.source).toBe("maps/test/entities/default_ents.vents");
    expect(parsed.focusable).toBe(true);
    expect(parsed.properties).toEqual({
      classname: "func_door",
      targetname: "door01",
      model: "models/doors/door01.vmdl",
      speed: "100",
      origin: "0 128 64",
    });
    expect(parsed.connections).toEqual([
      { output: "OnFullyOpen", target: "relay_open", input: "Trigger", parameter: "", delay: 0.5, timesToFire: -1 },
      { output: "OnFullyClosed", target: "missing_light", input: "TurnOff", parameter: "", delay: 0, timesToFire: 0 },
    ]);
  });

  it("shows the first entity with a targetname", () => {
    const { stdout } = run(["show", "map.yaml", "--name", "door01", "--format", "json"], FIXTURES);
    expect(JSON.parse(stdout).index).toBe(1);
  });

  it("shows the first entity passing the filters", () => {
    const { stdout } = run(["show", "map.yaml", "-c", "relay", "--format", "json"], FIXTURES);
    const parsed = JSON.parse(stdout);
    expect(parsed.index).toBe(2);
    expect(parsed.title).toBe("Entity Properties - relay_open - Entity Lump: maps/test/entities/default_ents.vents");
  });

  it("marks worldspawn as not focusable", () => {
    const { stdout } = run(["show", "map.yaml", "--index", "0", "--format", "json"], FIXTURES);
    const parsed = JSON.parse(stdout);
    expect(parsed.title).toBe("Entity Properties - worldspawn - Entity Lump: maps/test/entities/default_ents.vents");
    expect(parsed.focusable).toBe(false);
  });

  it("text format shows properties and outputs", () => {
    const { stdout, exitCode } = run(["show", "map.yaml", "--index", "1"], FIXTURES);
    expect(exitCode).toBe(0);
    const lines = stdout.split("\n");
    expect(lines[0]).toBe("Entity Properties - door01 - Entity Lump: maps/test/entities/default_ents.vents");
    expect(lines).toContain("  origin      0 128 64");
    expect(lines).toContain("outputs:");
    expect(lines).toContain("  OnFullyOpen → relay_open.Trigger delay 0.5");
    expect(lines).toContain("  OnFullyClosed → missing_light.TurnOff");
  });

  it("text format omits the outputs section for an entity without outputs", () => {
    const { stdout } = run(["show", "map.yaml", "--index", "3"], FIXTURES);
    expect(stdout).not.toContain("outputs:");
  });

  it("yaml format", () => {
    const { stdout, exitCode } = run(["show", "map.yaml", "--index", "4", "--format", "yaml"], FIXTURES);
    expect(exitCode).toBe(0);
    expect(stdout).toContain("classname: info_player_start");
    expect(stdout).toContain("connections: []");
  });

  describe("error handling", () => {
    it("exits 4 for an unknown name", () => {
      const { exitCode, stdout } = run(["show", "map.yaml", "--name", "nope", "--format", "json"], FIXTURES);
      expect(exitCode).toBe(4);
      expect(JSON.parse(stdout).error).toEqual({ code: "not_found", message: 'no entity named "nope"' });
    });

    it("exits 4 for an index past the end", () => {
      const { exitCode } = run(["show", "map.yaml", "--index", "99"], FIXTURES);
      expect(exitCode).toBe(4);
    });

    it("exits 1 for a malformed index", () => {
      const { exitCode } = run(["show", "map.yaml", "--index", "one"], FIXTURES);
      expect(exitCode).toBe(1);
    });

    it("exits 4 when no entity passes the filters", () => {
      const { exitCode } = run(["show", "map.yaml", "-c", "npc_"], FIXTURES);
      expect(exitCode).toBe(4);
    });
  });
});

describe("printEntity", () => {
  it("prints JSON properties in entity order", () => {
    const entries: Array<[string, unknown]> = [
      ["classname", "logic_auto"],
      ["3829182734", "1"],
    ];
    const lines: string[] = [];
    const log = vi.spyOn(console, "log").mockImplementation((text?: unknown) => {
      lines.push(String(text));
    });
    try {
      printEntity(createEntity({ properties: entries }), 0, "json");
    } finally {
      log.mockRestore();
    }

    expect(lines).toEqual([
      [
        "{",
        '  "index": 0,',
        '  "title": "Entity Properties - logic_auto",',
        '  "classname": "logic_auto",',
        '  "targetname": "",',
        '  "focusable": true,',
        '  "properties": {',
        '    "classname": "logic_auto",',
        '    "3829182734": "1"',
        "  },",
        '  "connections": []',
        "}",
      ].join("\n"),
    ]);
  });
});
