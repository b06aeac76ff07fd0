import type Database from "better-sqlite3";
import fs from "fs";
import os from "os";
import path from "path";
import { fileURLToPath } from "url";
import { GameVersion } from "../src/core/game-version.js";
import { loadSchemaStore } from "../src/core/schema-store.js";
import type { SchemaStore } from "../src/core/schema-store.js";
import { openGamedata } from "../src/db/index.js";
import { ParamStore } from "../src/db/params.js";
import type { GeneratorContext } from "../src/generators/base.js";

export const SCHEMA_DIR = fileURLToPath(new URL("../schema", import.meta.url));
export const TEST_VERSION = new GameVersion(1, 2, 3);

export interface SeedRow {
  id: number;
  name?: string;
  fields: Record<string, string>;
}

export interface Seed {
  params?: Record<string, SeedRow[]>;
  messages?: Record<string, Record<number, string>>;
}

/** One dagger with a Heavy variant, plus an arrow, over regular reinforcement levels. */
export const ARMAMENT_SEED: Seed = {
  params: {
    EquipParamWeapon: [
      {
        id: 1000000,
        fields: {
          wepType: "1",
          behaviorVariationId: "1000",
          weight: "1.5",
          swordArtsParamId: "10",
          gemMountType: "2",
          isEnhance: "1",
          enableGuard: "0",
          reinforceTypeId: "0",
          atkAttribute: "2",
          atkAttribute2: "0",
          properStrength: "5",
          properAgility: "9",
          attackBasePhysics: "75",
          correctStrength: "35",
          correctAgility: "65.6",
          physGuardCutRate: "35",
          staminaGuardDef: "18",
          sellValue: "100",
          iconId: "1",
        },
      },
      { id: 1000100, fields: { wepType: "1", reinforceTypeId: "100", attackBasePhysics: "80", correctStrength: "60" } },
      { id: 50000000, fields: { wepType: "81", attackBasePhysics: "30", atkAttribute: "2", atkAttribute2: "2" } },
    ],
    ReinforceParamWeapon: [{ id: 0, fields: {} }, { id: 25, fields: {} }],
  },
  messages: {
    WeaponName: { 1000000: "Test Dagger", 50000000: "Test Arrow" },
  },
};

let schemaStore: SchemaStore | undefined;

export function testSchemaStore(): SchemaStore {
  schemaStore ??= loadSchemaStore(SCHEMA_DIR);
  return schemaStore;
}

export function seedStore(store: ParamStore, seed: Seed): void {
  for (const [stem, rows] of Object.entries(seed.params ?? {})) {
    store.replaceParam(stem, rows.map((row) => ({ id: row.id, name: row.name ?? "", fields: row.fields })));
  }
  for (const [bank, entries] of Object.entries(seed.messages ?? {})) {
    store.replaceMessages(bank, Object.entries(entries).map(([id, text]) => ({ id: Number(id), text })));
  }
}

export function createContext(seed: Seed): { context: GeneratorContext; db: Database.Database } {
  const db = openGamedata(":memory:");
  const params = new ParamStore(db);
  seedStore(params, seed);
  return { db, context: { version: TEST_VERSION, params, schemaStore: testSchemaStore() } };
}

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "erdb-test-"));
}
