/** SQL schema for the catalog. */
export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS items (
  id            TEXT PRIMARY KEY,
  category      TEXT NOT NULL
                CHECK(category IN ('music','game','book','movie','tv','podcast','paper')),
  title         TEXT NOT NULL,
  creator       TEXT,
  created_at    TEXT NOT NULL,
  updated_at    TEXT NOT NULL
);

-- Provenance edges; source_key is 'id:<external id>' or 'fp:<fingerprint>'
CREATE TABLE IF NOT EXISTS item_sources (
  item_id       TEXT NOT NULL REFERENCES items(id) ON DELETE CASCADE,
  source        TEXT NOT NULL,
  source_key    TEXT NOT NULL,
  external_id   TEXT,
  fingerprint   TEXT NOT NULL,
  raw_title     TEXT NOT NULL,
  raw_creator   TEXT,
  source_loved  INTEGER,        -- 1 loved, 0 disliked, NULL unknown
  imported_at   TEXT NOT NULL,
  PRIMARY KEY (item_id, source, source_key)
);

CREATE TABLE IF NOT EXISTS ratings (
  item_id       TEXT PRIMARY KEY REFERENCES items(id) ON DELETE CASCADE,
  loved         INTEGER,        -- 1 loved, 0 disliked, NULL neutral
  rating        INTEGER CHECK(rating IS NULL OR (rating >= 1 AND rating <= 5)),
  notes         TEXT,
  origin        TEXT NOT NULL DEFAULT 'import' CHECK(origin IN ('user','import')),
  rated_at      TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS wishlist_items (
  id            TEXT PRIMARY KEY,
  category      TEXT NOT NULL,
  title         TEXT NOT NULL,
  creator       TEXT,
  notes         TEXT,
  created_at    TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_items_category     ON items(category);
CREATE INDEX IF NOT EXISTS idx_sources_key        ON item_sources(source, source_key);
CREATE INDEX IF NOT EXISTS idx_wishlist_category  ON wishlist_items(category);
`;
