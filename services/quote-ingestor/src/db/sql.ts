// services/quote-ingestor/src/db/sql.ts
export const SQL = {
  stocks: {
    idByTicker: `
      SELECT id
      FROM stocks
      WHERE ticker = $1
    `,
    insert: `
      INSERT INTO stocks(ticker, name)
      VALUES ($1, $2)
      RETURNING id
    `,
    setLastUpdate: `
      UPDATE stocks
      SET "lastUpdate" = $2
      WHERE id = $1
    `,
  },
  quotes: {
    // check-then-insert as one statement; needs no unique constraint to stay idempotent
    insertIfAbsent: `
      INSERT INTO quotes(stock, price, "timestamp")
      SELECT $1, $2::numeric, $3::timestamptz
      WHERE NOT EXISTS (
        SELECT 1
        FROM quotes
        WHERE stock = $1 AND "timestamp" = $3::timestamptz
      )
      RETURNING id
    `,
    maxTimestamp: `
      SELECT MAX("timestamp") AS "maxTs"
      FROM quotes
      WHERE stock = $1
    `,
  },
} as const;
