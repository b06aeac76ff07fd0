import type Database from "better-sqlite3";

export function initializeGamedataSchema(db: Database.Database): void {
  db.exec(`
    -- One row per param table row, e.g. stem 'EquipParamWeapon', id 1000000
    CREATE TABLE IF NOT EXISTS params (
      stem TEXT NOT NULL,                  -- param table name
      id INTEGER NOT NULL,
      name TEXT,                           -- row name from the dump, often empty
      fields TEXT NOT NULL,                -- JSON object of field name -> raw value
      PRIMARY KEY (stem, id)
    );

    -- Text banks: item names, short infos and long captions
    CREATE TABLE IF NOT EXISTS messages (
      bank TEXT NOT NULL,                  -- e.g. 'WeaponName', 'GoodsCaption'
      id INTEGER NOT NULL,
      text TEXT NOT NULL,
      PRIMARY KEY (bank, id)
    );

    -- Bookkeeping of import runs
    CREATE TABLE IF NOT EXISTS imports (
      source TEXT NOT NULL PRIMARY KEY,    -- 'param:<stem>' or 'msg:<bank>'
      file TEXT NOT NULL,
      row_count INTEGER NOT NULL,
      imported_at TEXT NOT NULL
    );
  `);
}

export function initializeCatalogSchema(db: Database.Database): void {
  db.exec(`
    -- Generated elements of every category of one game version
    CREATE TABLE IF NOT EXISTS items (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      category TEXT NOT NULL,              -- game param tag, e.g. 'armaments'
      key TEXT NOT NULL,                   -- element key in the output document
      name TEXT,
      summary TEXT,
      data TEXT NOT NULL,                  -- JSON of the element
      UNIQUE(category, key)
    );

    CREATE VIRTUAL TABLE IF NOT EXISTS search_index USING fts5(
      category,
      item_id UNINDEXED,                   -- FK back to items
      name,
      content,
      tokenize='porter unicode61'
    );

    CREATE INDEX IF NOT EXISTS idx_items_key ON items(key);
  `);
}
