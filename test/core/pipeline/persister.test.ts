/**
 * Tests for output persistence
 */

import { promises } from "node:fs";
import { readFile, readdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { PersistenceError } from "../../../src/core/errors";
import {
  outputExists,
  persist,
  serializeMonsters,
} from "../../../src/core/pipeline/persister";
import type { Monster } from "../../../src/core/types";
import { createTempDir, removeTempDir } from "../../helpers/tempDir";

const goblin: Monster = {
  name: "Goblin",
  hitPoints: 7,
  armorClass: 15,
  actions: [{ name: "Scimitar", desc: "slash" }],
};

const wraith: Monster = {
  name: "Wraith",
  hitPoints: null,
  armorClass: null,
  actions: [],
};

let dir: string;

beforeEach(async () => {
  dir = await createTempDir();
});

afterEach(async () => {
  vi.restoreAllMocks();
  await removeTempDir(dir);
});

describe("serializeMonsters", () => {
  it("writes an indented array with snake_case keys in order", () => {
    expect(serializeMonsters([wraith])).toBe(
      [
        "[",
        "  {",
        '    "name": "Wraith",',
        '    "hit_points": null,',
        '    "armor_class": null,',
        '    "actions": []',
        "  }",
        "]",
        "",
      ].join("\n"),
    );
  });

  it("leaves non-ASCII characters unescaped", () => {
    const text = serializeMonsters([{ ...wraith, name: "Aboleth – Ürgeist" }]);
    expect(text).toContain('"name": "Aboleth – Ürgeist"');
  });

  it("writes 0 as 0", () => {
    const text = serializeMonsters([{ ...wraith, hitPoints: 0 }]);
    expect(JSON.parse(text)).toEqual([
      { name: "Wraith", hit_points: 0, armor_class: null, actions: [] },
    ]);
  });
});

describe("persist", () => {
  it("writes the file and returns the destination", async () => {
    const destination = path.join(dir, "monsters.json");

    const result = await persist([goblin, wraith], destination);

    expect(result).toBe(destination);
    expect(JSON.parse(await readFile(destination, "utf8"))).toEqual([
      {
        name: "Goblin",
        hit_points: 7,
        armor_class: 15,
        actions: [{ name: "Scimitar", desc: "slash" }],
      },
      { name: "Wraith", hit_points: null, armor_class: null, actions: [] },
    ]);
  });

  it("leaves no temp file behind", async () => {
    await persist([goblin], path.join(dir, "monsters.json"));
    expect(await readdir(dir)).toEqual(["monsters.json"]);
  });

  it("creates missing parent directories", async () => {
    const destination = path.join(dir, "out", "run", "monsters.json");
    await persist([goblin], destination);
    expect(await outputExists(destination)).toBe(true);
  });

  it("refuses to overwrite an existing file", async () => {
    const destination = path.join(dir, "monsters.json");
    await writeFile(destination, "[]\n", "utf8");

    await expect(persist([goblin], destination)).rejects.toThrow(
      `Refusing to overwrite existing output: ${destination}`,
    );
    expect(await readFile(destination, "utf8")).toBe("[]\n");
    expect(await readdir(dir)).toEqual(["monsters.json"]);
  });

  it("fails with PersistenceError when the directory cannot be created", async () => {
    const blocker = path.join(dir, "blocker");
    await writeFile(blocker, "", "utf8");

    await expect(persist([goblin], path.join(blocker, "monsters.json"))).rejects.toBeInstanceOf(
      PersistenceError,
    );
  });
});

describe("persist temp file cleanup", () => {
  it("removes a partially written temp file when the write fails", async () => {
    const realWriteFile = promises.writeFile;
    vi.spyOn(promises, "writeFile").mockImplementation(async (file) => {
      await realWriteFile(file, "[\n  {", "utf8");
      throw Object.assign(new Error("ENOSPC: no space left on device"), {
        code: "ENOSPC",
      });
    });
    const destination = path.join(dir, "monsters.json");

    await expect(persist([goblin], destination)).rejects.toThrow(
      `Failed to save monsters to ${destination}: ENOSPC: no space left on device`,
    );
    expect(await readdir(dir)).toEqual([]);
  });

  it("resolves once linked even if removing the temp file fails", async () => {
    vi.spyOn(promises, "rm").mockRejectedValue(new Error("EBUSY: resource busy"));
    const destination = path.join(dir, "monsters.json");

    await expect(persist([goblin], destination)).resolves.toBe(destination);
    expect(JSON.parse(await readFile(destination, "utf8"))).toEqual([
      {
        name: "Goblin",
        hit_points: 7,
        armor_class: 15,
        actions: [{ name: "Scimitar", desc: "slash" }],
      },
    ]);
  });
});

describe("outputExists", () => {
  it("reports whether the path exists", async () => {
    const destination = path.join(dir, "monsters.json");
    expect(await outputExists(destination)).toBe(false);
    await writeFile(destination, "[]", "utf8");
    expect(await outputExists(destination)).toBe(true);
  });
});
