import path from "path";

function readInt(name: string, fallback: number, min: number): number {
  const raw = process.env[name];
  if (typeof raw !== "string" || !raw.trim()) return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n)) return fallback;
  return Math.max(min, Math.trunc(n));
}

// Values are read on access so tests and `dotenv.config()` can set the environment first.
export const config = {
  get port(): number {
    return readInt("PORT", 4100, 0);
  },

  get dbPath(): string {
    const raw = process.env.CHARTWRIGHT_DB_PATH;
    if (typeof raw === "string" && raw.trim()) return raw.trim();
    return path.join(__dirname, "..", "data", "chartwright.db");
  },

  // Oldest history entries are dropped once a payload holds more than this.
  get historyLimit(): number {
    return readInt("CHARTWRIGHT_HISTORY_LIMIT", 200, 1);
  },

  get jsonBodyLimit(): string {
    return process.env.CHARTWRIGHT_JSON_LIMIT ?? "1mb";
  },
};
