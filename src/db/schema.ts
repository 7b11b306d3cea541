import {
  pgTable,
  serial,
  text,
  varchar,
  timestamp,
  boolean,
  integer,
  real,
  pgEnum,
} from "drizzle-orm/pg-core";
import { relations } from "drizzle-orm";

export const detectionSourceEnum = pgEnum("detection_source", [
  "upload",
  "camera",
  "import",
  "api",
]);
export const matchSourceEnum = pgEnum("match_source", [
  "DIRECT",
  "MERGED",
  "OVERLAY",
]);

// --- License Plate Tables ---

export const licensePlates = pgTable("license_plates", {
  id: serial("id").primaryKey(),
  plateNumber: varchar("plateNumber", { length: 20 }).notNull().unique(),
  createdAt: timestamp("createdAt", { mode: "date", withTimezone: true })
    .defaultNow()
    .notNull(),
  updatedAt: timestamp("updatedAt", { mode: "date", withTimezone: true })
    .defaultNow()
    .notNull()
    .$onUpdate(() => new Date()),
});

export const licensePlatesRelations = relations(licensePlates, ({ many }) => ({
  detectionResults: many(detectedPlateResults),
}));

export const detections = pgTable("detections", {
  id: serial("id").primaryKey(),
  source: detectionSourceEnum("source").default("api"),
  imageUrl: text("imageUrl").notNull(),
  fragmentCount: integer("fragmentCount").notNull().default(0),
  detectionTime: timestamp("detectionTime", { mode: "date", withTimezone: true })
    .defaultNow()
    .notNull(),
  processTimeMs: integer("processTimeMs"),
  createdAt: timestamp("createdAt", { mode: "date", withTimezone: true })
    .defaultNow()
    .notNull(),
  updatedAt: timestamp("updatedAt", { mode: "date", withTimezone: true })
    .defaultNow()
    .notNull()
    .$onUpdate(() => new Date()),
});

export const detectionsRelations = relations(detections, ({ many }) => ({
  detectedPlates: many(detectedPlateResults),
}));

export const detectedPlateResults = pgTable("detected_plate_results", {
  id: serial("id").primaryKey(),
  detectionId: integer("detectionId")
    .notNull()
    .references(() => detections.id, { onDelete: "cascade" }),
  licensePlateId: integer("licensePlateId").references(() => licensePlates.id, {
    onDelete: "set null",
  }),

  plateNumber: varchar("plateNumber", { length: 20 }).notNull(),
  normalizedPlate: varchar("normalizedPlate", { length: 20 }),

  // 0-100, as reported by the recognizer
  confidence: real("confidence").notNull(),
  matchSource: matchSourceEnum("matchSource").notNull(),
  patternName: varchar("patternName", { length: 50 }).notNull(),
  provinceCode: varchar("provinceCode", { length: 10 }),
  provinceName: varchar("provinceName", { length: 100 }),
  isValidFormat: boolean("isValidFormat").notNull(),
  isLowConfidence: boolean("isLowConfidence").notNull().default(false),

  createdAt: timestamp("createdAt", { mode: "date", withTimezone: true })
    .defaultNow()
    .notNull(),
  updatedAt: timestamp("updatedAt", { mode: "date", withTimezone: true })
    .defaultNow()
    .notNull()
    .$onUpdate(() => new Date()),
});

export const detectedPlateResultsRelations = relations(
  detectedPlateResults,
  ({ one }) => ({
    detection: one(detections, {
      fields: [detectedPlateResults.detectionId],
      references: [detections.id],
    }),
    licensePlate: one(licensePlates, {
      fields: [detectedPlateResults.licensePlateId],
      references: [licensePlates.id],
    }),
  })
);

export type DetectionSource = (typeof detectionSourceEnum.enumValues)[number];
export type DetectionSelect = typeof detections.$inferSelect;
export type DetectedPlateResultSelect = typeof detectedPlateResults.$inferSelect;
export type LicensePlateSelect = typeof licensePlates.$inferSelect;
