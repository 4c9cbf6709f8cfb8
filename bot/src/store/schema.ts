import { sqliteTable, integer, text } from "drizzle-orm/sqlite-core";

export const sessions = sqliteTable("sessions", {
  sessionName: text("session_name").primaryKey(),
  proxy: text("proxy"),
  userAgent: text("user_agent").notNull(),
  farmJson: text("farm_json").notNull(), // {resourceType: boolean}
  prioritiesJson: text("priorities_json").notNull(), // {hero: {resourceType: rank}}
  constellationLastIndex: integer("constellation_last_index"),
  constellationAutoAdvance: integer("constellation_auto_advance", { mode: "boolean" }).notNull().default(false),
  trackedConstellationIndex: integer("tracked_constellation_index"),
  gemsSafeBalance: integer("gems_safe_balance").notNull(),
  buyGachaPacks: integer("buy_gacha_packs", { mode: "boolean" }).notNull().default(false),
  spendGachas: integer("spend_gachas", { mode: "boolean" }).notNull().default(false),
  processMissions: integer("process_missions", { mode: "boolean" }).notNull().default(false),
  upgradeCards: integer("upgrade_cards", { mode: "boolean" }).notNull().default(true),
  createdAt: integer("created_at", { mode: "timestamp" }).$defaultFn(() => new Date()),
  updatedAt: integer("updated_at", { mode: "timestamp" }).$defaultFn(() => new Date()),
});

export type SessionRow = typeof sessions.$inferSelect;
export type NewSessionRow = typeof sessions.$inferInsert;
