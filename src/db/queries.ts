import * as schema from "./schema";
import {
  eq,
  desc,
  asc,
  inArray,
  and,
  sql,
  ilike,
  gte,
  lte,
  count,
  SQL,
  lt,
} from "drizzle-orm";
import type { AnyColumn } from "drizzle-orm";
import { startOfDay, addDays } from "date-fns";
import type { Database } from "./index";
import type { ApiResponse } from "../types";
import type {
  DetectedPlateResultSelect,
  DetectionSelect,
  DetectionSource,
  LicensePlateSelect,
} from "./schema";

export type ApiPaginationState = { pageIndex: number; pageSize: number };
export type ApiSort = { id: string; desc: boolean };
export type ApiSortingState = ApiSort[];
export type ApiColumnFiltersState = { id: string; value: unknown }[];
export type ApiDateRange = { from?: Date; to?: Date };
export type ApiNumberRange = [number | undefined, number | undefined];

type DetectedPlateResultInsert = typeof schema.detectedPlateResults.$inferInsert;
type MatchSource = (typeof schema.matchSourceEnum.enumValues)[number];

export type SavedDetection = DetectionSelect & {
  detectedPlates: DetectedPlateResultSelect[];
};

export type HistoryQueryResultItem = DetectedPlateResultSelect & {
  detection: DetectionSelect | null;
  licensePlate: LicensePlateSelect | null;
};

export interface FetchHistoryResult {
  rows: HistoryQueryResultItem[];
  totalRowCount: number;
}

export interface FilterOptions {
  provinces: string[];
  patterns: string[];
  sources: string[];
  matchSources: string[];
}

/** Persistence used by the HTTP layer; tests swap in an in-memory one. */
export interface DetectionStore {
  insertDetectionAndResults(
    apiResponse: ApiResponse,
    source: DetectionSource,
    originalImageUrl: string
  ): Promise<SavedDetection | null>;
  fetchDetectionHistory(
    pagination: ApiPaginationState,
    sorting: ApiSortingState,
    filters: ApiColumnFiltersState
  ): Promise<FetchHistoryResult>;
  getFilterOptions(): Promise<FilterOptions>;
}

const DETECTION_SOURCES: readonly string[] = schema.detectionSourceEnum.enumValues;
const MATCH_SOURCES: readonly string[] = schema.matchSourceEnum.enumValues;

export function isDetectionSource(value: string): value is DetectionSource {
  return DETECTION_SOURCES.includes(value);
}

function isMatchSource(value: string): value is MatchSource {
  return MATCH_SOURCES.includes(value);
}

/** Key shared by every spelling of one plate: `TS12 UD 3371` -> `TS12UD3371`. */
export function plateKey(plateText: string): string {
  return plateText.replace(/\s+/g, "");
}

const sortColumnMap: Record<string, AnyColumn> = {
  plateNumber: schema.detectedPlateResults.plateNumber,
  normalizedPlate: schema.detectedPlateResults.normalizedPlate,
  confidence: schema.detectedPlateResults.confidence,
  date: schema.detections.detectionTime,
  provinceName: schema.detectedPlateResults.provinceName,
  patternName: schema.detectedPlateResults.patternName,
  matchSource: schema.detectedPlateResults.matchSource,
  isValidFormat: schema.detectedPlateResults.isValidFormat,
  source: schema.detections.source,
  processTime: schema.detections.processTimeMs,
};

function isNumberRange(value: unknown): value is ApiNumberRange {
  return (
    Array.isArray(value) &&
    value.length === 2 &&
    value.every((v) => v === undefined || typeof v === "number") &&
    (typeof value[0] === "number" || typeof value[1] === "number")
  );
}

function rangeCondition(column: AnyColumn, [min, max]: ApiNumberRange): SQL | undefined {
  const conditionList: SQL[] = [];
  if (typeof min === "number") conditionList.push(gte(column, min));
  if (typeof max === "number") conditionList.push(lte(column, max));
  return conditionList.length > 0 ? and(...conditionList) : undefined;
}

function isDateRange(value: unknown): value is ApiDateRange {
  return (
    typeof value === "object" &&
    value !== null &&
    ("from" in value || "to" in value)
  );
}

/**
 * Parses API filter parameters into Drizzle WHERE conditions.
 */
export function parseFiltersToDrizzle(filters: ApiColumnFiltersState): SQL | undefined {
  const conditions: SQL[] = [];
  const push = (condition: SQL | undefined) => {
    if (condition) conditions.push(condition);
  };

  for (const { id, value } of filters) {
    switch (id) {
      case "plateNumber":
      case "normalizedPlate":
      case "provinceName":
        if (typeof value === "string" && value.length > 0) {
          const column =
            id === "plateNumber"
              ? schema.detectedPlateResults.plateNumber
              : id === "normalizedPlate"
                ? schema.detectedPlateResults.normalizedPlate
                : schema.detectedPlateResults.provinceName;
          push(ilike(column, `%${value}%`));
        }
        break;
      case "patternName":
        if (typeof value === "string" && value.length > 0) {
          push(eq(schema.detectedPlateResults.patternName, value));
        }
        break;
      case "source":
        if (typeof value === "string" && isDetectionSource(value)) {
          push(eq(schema.detections.source, value));
        }
        break;
      case "matchSource":
        if (typeof value === "string" && isMatchSource(value)) {
          push(eq(schema.detectedPlateResults.matchSource, value));
        }
        break;
      case "confidence":
        if (isNumberRange(value)) {
          push(rangeCondition(schema.detectedPlateResults.confidence, value));
        }
        break;
      case "processTime":
        if (isNumberRange(value)) {
          push(rangeCondition(schema.detections.processTimeMs, value));
        }
        break;
      case "isValidFormat":
        if (typeof value === "boolean") {
          push(eq(schema.detectedPlateResults.isValidFormat, value));
        }
        break;
      case "isLowConfidence":
        if (typeof value === "boolean") {
          push(eq(schema.detectedPlateResults.isLowConfidence, value));
        }
        break;
      case "date":
        if (isDateRange(value)) {
          const { from, to } = value;
          const conditionList: SQL[] = [];
          if (from instanceof Date) {
            conditionList.push(gte(schema.detections.detectionTime, startOfDay(from)));
          }
          if (to instanceof Date) {
            conditionList.push(
              lt(schema.detections.detectionTime, addDays(startOfDay(to), 1))
            );
          }
          if (conditionList.length > 0) push(and(...conditionList));
        }
        break;
      default:
        break;
    }
  }

  if (conditions.length === 0) {
    return undefined;
  }
  return and(...conditions);
}

/**
 * Parses API sorting parameters into Drizzle ORDER BY clause.
 */
export function parseSortingToDrizzle(sorting: ApiSortingState): SQL[] {
  if (sorting.length === 0) {
    return [desc(schema.detections.detectionTime)];
  }

  return sorting.map((sort: ApiSort) => {
    const column = sortColumnMap[sort.id];
    if (!column) {
      return desc(schema.detections.detectionTime);
    }
    return sort.desc ? desc(column) : asc(column);
  });
}

export function createDetectionStore(db: Database): DetectionStore {
  async function insertDetectionAndResults(
    apiResponse: ApiResponse,
    source: DetectionSource,
    originalImageUrl: string
  ): Promise<SavedDetection | null> {
    if (!apiResponse || apiResponse.plates.length === 0) {
      console.log("No plates to save.");
      return null;
    }

    try {
      const result = await db.transaction(async (tx) => {
        // 1. Insert Detection
        const detectionInsertResult = await tx
          .insert(schema.detections)
          .values({
            source: source,
            imageUrl: originalImageUrl,
            fragmentCount: apiResponse.allDetectedText.length,
            detectionTime: new Date(),
            processTimeMs: Math.round(apiResponse.processingTimeMs),
          })
          .returning({ insertedId: schema.detections.id });

        const detectionId = detectionInsertResult[0]?.insertedId;
        if (!detectionId) {
          throw new Error("Failed to insert detection record.");
        }

        // 2. Find/Create License Plates, keyed without separators
        const uniquePlateNumbers = [
          ...new Set(apiResponse.plates.map((p) => plateKey(p.text))),
        ];

        const licensePlateRecords: Record<string, number> = {};

        await tx
          .insert(schema.licensePlates)
          .values(uniquePlateNumbers.map((pn) => ({ plateNumber: pn })))
          .onConflictDoNothing({ target: schema.licensePlates.plateNumber });

        const fetchedPlates = await tx
          .select({
            id: schema.licensePlates.id,
            plateNumber: schema.licensePlates.plateNumber,
          })
          .from(schema.licensePlates)
          .where(inArray(schema.licensePlates.plateNumber, uniquePlateNumbers));

        fetchedPlates.forEach((p) => {
          licensePlateRecords[p.plateNumber] = p.id;
        });

        // 3. Insert Detected Plate Results
        const plateDataToInsert: DetectedPlateResultInsert[] = apiResponse.plates.map(
          (plate) => ({
            detectionId: detectionId,
            licensePlateId: licensePlateRecords[plateKey(plate.text)] ?? null,
            plateNumber: plate.text,
            normalizedPlate: plateKey(plate.text),
            confidence: plate.confidence,
            matchSource: plate.source,
            patternName: plate.pattern,
            provinceCode: plate.jurisdiction?.code ?? null,
            provinceName: plate.jurisdiction?.name ?? null,
            isValidFormat: plate.isValidated,
            isLowConfidence: plate.isLowConfidence,
          })
        );

        await tx.insert(schema.detectedPlateResults).values(plateDataToInsert);

        return { id: detectionId };
      });

      const createdDetection = await db.query.detections.findFirst({
        where: eq(schema.detections.id, result.id),
        with: {
          detectedPlates: true,
        },
      });

      return createdDetection ?? null;
    } catch (error) {
      console.error("Error in insertDetectionAndResults:", error);
      throw new Error("Failed to save detection result via query function.");
    }
  }

  /**
   * Fetches detection history based on API parameters.
   */
  async function fetchDetectionHistory(
    pagination: ApiPaginationState,
    sorting: ApiSortingState,
    filters: ApiColumnFiltersState
  ): Promise<FetchHistoryResult> {
    const { pageIndex, pageSize } = pagination;
    const offset = pageIndex * pageSize;

    const whereCondition = parseFiltersToDrizzle(filters);
    const orderByCondition = parseSortingToDrizzle(sorting);

    try {
      const query = db
        .select()
        .from(schema.detectedPlateResults)
        .leftJoin(
          schema.detections,
          eq(schema.detectedPlateResults.detectionId, schema.detections.id)
        )
        .leftJoin(
          schema.licensePlates,
          eq(schema.detectedPlateResults.licensePlateId, schema.licensePlates.id)
        )
        .where(whereCondition)
        .orderBy(...orderByCondition)
        .limit(pageSize)
        .offset(offset);

      const countQuery = db
        .select({ totalCount: count() })
        .from(schema.detectedPlateResults)
        .leftJoin(
          schema.detections,
          eq(schema.detectedPlateResults.detectionId, schema.detections.id)
        )
        .where(whereCondition);

      const [rows, totalResult] = await Promise.all([
        query,
        countQuery.then((res) => res[0]),
      ]);

      const mappedRows: HistoryQueryResultItem[] = rows.map((row) => ({
        ...row.detected_plate_results,
        detection: row.detections,
        licensePlate: row.license_plates,
      }));

      return {
        rows: mappedRows,
        totalRowCount: totalResult?.totalCount || 0,
      };
    } catch (error) {
      console.error("Error fetching detection history:", error);
      throw new Error("Failed to fetch detection history from database.");
    }
  }

  /**
   * Fetches distinct options for filtering.
   */
  async function getFilterOptions(): Promise<FilterOptions> {
    try {
      const [provincesResult, patternsResult, sourcesResult, matchSourcesResult] =
        await Promise.all([
          db
            .selectDistinct({ province: schema.detectedPlateResults.provinceName })
            .from(schema.detectedPlateResults)
            .where(sql`${schema.detectedPlateResults.provinceName} IS NOT NULL`)
            .orderBy(asc(schema.detectedPlateResults.provinceName)),
          db
            .selectDistinct({ pattern: schema.detectedPlateResults.patternName })
            .from(schema.detectedPlateResults)
            .orderBy(asc(schema.detectedPlateResults.patternName)),
          db
            .selectDistinct({ source: schema.detections.source })
            .from(schema.detections)
            .where(sql`${schema.detections.source} IS NOT NULL`)
            .orderBy(asc(schema.detections.source)),
          db
            .selectDistinct({ matchSource: schema.detectedPlateResults.matchSource })
            .from(schema.detectedPlateResults)
            .orderBy(asc(schema.detectedPlateResults.matchSource)),
        ]);

      return {
        provinces: provincesResult
          .map((p) => p.province)
          .filter((p): p is string => typeof p === "string"),
        patterns: patternsResult.map((p) => p.pattern),
        sources: sourcesResult
          .map((s) => s.source)
          .filter((s): s is DetectionSource => s !== null),
        matchSources: matchSourcesResult.map((m) => m.matchSource),
      };
    } catch (error) {
      console.error("Error fetching filter options:", error);
      throw new Error("Failed to fetch filter options from database.");
    }
  }

  return { insertDetectionAndResults, fetchDetectionHistory, getFilterOptions };
}
