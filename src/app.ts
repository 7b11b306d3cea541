import { Hono } from "hono";
import { cors } from "hono/cors";
import { logger } from "hono/logger";
import { z } from "zod";

import {
  describeTemplate,
  extractPlates,
  RecognitionConfigError,
  resolveConfig,
} from "./plates";
import type { RecognizeConfig, TextFragment } from "./plates";
import type {
  ApiColumnFiltersState,
  ApiDateRange,
  ApiPaginationState,
  ApiSortingState,
  DetectionStore,
} from "./db/queries";
import type { DetectionSource } from "./db/schema";
import type {
  ApiResponse,
  BatchImageResult,
  BatchResponse,
  BatchSummary,
} from "./types";

export interface AppOptions {
  /** Without a store nothing is persisted and the history routes answer 503. */
  store?: DetectionStore;
  defaults?: RecognizeConfig;
  corsOrigin?: string;
}

const fragmentSchema = z.object({
  text: z.string(),
  confidence: z.number(),
  order: z.number().int().optional(),
});

const configSchema = z
  .object({
    confidenceThreshold: z.number(),
    includeLowConfidence: z.boolean(),
    lowConfidenceThreshold: z.number(),
    customPattern: z.string(),
    patternMode: z.enum(["replace", "extend"]),
    allowedPrefixes: z.array(z.string()),
    includeUnverified: z.boolean(),
    mergeWindow: z.number(),
  })
  .partial()
  .strict();

const sourceSchema = z.enum(["upload", "camera", "import", "api"]);

const recognizeBodySchema = z.object({
  fragments: z.array(fragmentSchema),
  config: configSchema.optional(),
  source: sourceSchema.default("api"),
  imageUrl: z.string().min(1).default("inline"),
});

const batchBodySchema = z.object({
  images: z
    .array(
      z.object({
        imageUrl: z.string().min(1),
        fragments: z.array(fragmentSchema),
      })
    )
    .min(1)
    .max(100),
  config: configSchema.optional(),
  source: sourceSchema.default("import"),
});

const historyQuerySchema = z.object({
  pageIndex: z.coerce.number().int().min(0).default(0),
  pageSize: z.coerce.number().int().min(1).max(100).default(10),
  sortId: z.string().optional(),
  sortDesc: z.enum(["true", "false"]).optional(),
  plateNumber: z.string().optional(),
  normalizedPlate: z.string().optional(),
  provinceName: z.string().optional(),
  patternName: z.string().optional(),
  source: z.string().optional(),
  matchSource: z.string().optional(),
  isValidFormat: z.enum(["true", "false"]).optional(),
  isLowConfidence: z.enum(["true", "false"]).optional(),
  confidenceMin: z.coerce.number().min(0).max(100).optional(),
  confidenceMax: z.coerce.number().min(0).max(100).optional(),
  processTimeMin: z.coerce.number().int().min(0).optional(),
  processTimeMax: z.coerce.number().int().min(0).optional(),
  dateFrom: z.coerce.date().optional(),
  dateTo: z.coerce.date().optional(),
});

type HistoryQuery = z.infer<typeof historyQuerySchema>;

type FragmentInput = z.infer<typeof fragmentSchema>;

/** OCR collaborators that send no reading order get array order. */
export function toFragments(inputs: readonly FragmentInput[]): TextFragment[] {
  return inputs.map((input, index) => ({
    text: input.text,
    confidence: input.confidence,
    order: input.order ?? index,
  }));
}

export function summarizeBatch(results: readonly BatchImageResult[]): BatchSummary {
  const successful = results.filter((r) => r.success).length;
  const totalPlatesDetected = results.reduce((sum, r) => sum + r.plateCount, 0);
  return {
    totalImages: results.length,
    successful,
    failed: results.length - successful,
    totalPlatesDetected,
    averagePlatesPerImage: successful > 0 ? totalPlatesDetected / successful : 0,
  };
}

export function buildHistoryFilters(query: HistoryQuery): ApiColumnFiltersState {
  const filters: ApiColumnFiltersState = [];

  const textFilters = [
    "plateNumber",
    "normalizedPlate",
    "provinceName",
    "patternName",
    "source",
    "matchSource",
  ] as const;
  for (const key of textFilters) {
    const value = query[key];
    if (value !== undefined) filters.push({ id: key, value });
  }

  for (const key of ["isValidFormat", "isLowConfidence"] as const) {
    const value = query[key];
    if (value !== undefined) filters.push({ id: key, value: value === "true" });
  }

  if (query.confidenceMin !== undefined || query.confidenceMax !== undefined) {
    filters.push({
      id: "confidence",
      value: [query.confidenceMin, query.confidenceMax],
    });
  }
  if (query.processTimeMin !== undefined || query.processTimeMax !== undefined) {
    filters.push({
      id: "processTime",
      value: [query.processTimeMin, query.processTimeMax],
    });
  }

  const dateFilter: ApiDateRange = {};
  if (query.dateFrom) dateFilter.from = query.dateFrom;
  if (query.dateTo) dateFilter.to = query.dateTo;
  if (dateFilter.from || dateFilter.to) {
    filters.push({ id: "date", value: dateFilter });
  }

  return filters;
}

function configErrorBody(error: RecognitionConfigError) {
  return { error: error.name, details: error.message };
}

export function createApp(options: AppOptions = {}) {
  const { store, defaults = {} } = options;
  const app = new Hono();

  // --- Middleware ---
  app.use("*", logger());
  app.use("*", cors({ origin: options.corsOrigin ?? "*" }));

  async function processAndSave(
    fragments: TextFragment[],
    config: RecognizeConfig,
    source: DetectionSource,
    originalIdentifier: string // image file name or url
  ): Promise<ApiResponse> {
    const started = performance.now();
    const report = extractPlates(fragments, config);
    const apiResponseData: ApiResponse = {
      ...report,
      processingTimeMs: Math.round((performance.now() - started) * 100) / 100,
      error: null,
    };

    if (store && report.plateCount > 0) {
      try {
        console.log(`Saving detection from ${source}: ${originalIdentifier}`);
        const createdDetection = await store.insertDetectionAndResults(
          apiResponseData,
          source,
          originalIdentifier
        );
        if (!createdDetection) {
          console.warn(
            "DB insert function returned null, potential issue saving detection."
          );
        }
      } catch (dbError) {
        console.error("Error saving detection to database:", dbError);
        const message =
          dbError instanceof Error ? dbError.message : String(dbError);
        apiResponseData.error = `DB save failed: ${message}`;
      }
    }

    return apiResponseData;
  }

  // ------------------------------------
  // --- Routes ---
  // ------------------------------------

  app.get("/patterns", (c) => {
    try {
      const { templates } = resolveConfig(defaults);
      return c.json({
        patterns: templates.map((template, priority) => ({
          priority,
          name: template.name,
          shape: describeTemplate(template),
          minLength: template.minLength,
          maxLength: template.maxLength,
        })),
      });
    } catch (error) {
      if (error instanceof RecognitionConfigError) {
        console.error("Configured recognizer defaults are invalid:", error);
        return c.json(configErrorBody(error), 500);
      }
      throw error;
    }
  });

  app.post("/recognize", async (c) => {
    const body: unknown = await c.req.json().catch(() => undefined);
    const validationResult = recognizeBodySchema.safeParse(body);

    if (!validationResult.success) {
      return c.json(
        {
          error: "Invalid request body",
          details: validationResult.error.flatten(),
        },
        400
      );
    }

    const { fragments, config, source, imageUrl } = validationResult.data;

    try {
      const result = await processAndSave(
        toFragments(fragments),
        { ...defaults, ...config },
        source,
        imageUrl
      );
      return c.json(result);
    } catch (error) {
      if (error instanceof RecognitionConfigError) {
        return c.json(configErrorBody(error), 400);
      }
      console.error("Error recognizing plates:", error);
      return c.json(
        {
          error: "An unexpected server error occurred.",
          details: error instanceof Error ? error.message : String(error),
        },
        500
      );
    }
  });

  app.post("/recognize/batch", async (c) => {
    const body: unknown = await c.req.json().catch(() => undefined);
    const validationResult = batchBodySchema.safeParse(body);

    if (!validationResult.success) {
      return c.json(
        {
          error: "Invalid request body",
          details: validationResult.error.flatten(),
        },
        400
      );
    }

    const { images, config, source } = validationResult.data;
    const effectiveConfig: RecognizeConfig = { ...defaults, ...config };

    try {
      resolveConfig(effectiveConfig);
    } catch (error) {
      if (error instanceof RecognitionConfigError) {
        return c.json(configErrorBody(error), 400);
      }
      throw error;
    }

    const results: BatchImageResult[] = [];
    for (const image of images) {
      try {
        const result = await processAndSave(
          toFragments(image.fragments),
          effectiveConfig,
          source,
          image.imageUrl
        );
        results.push({ ...result, imageUrl: image.imageUrl, success: true });
      } catch (error) {
        console.error(`Error processing ${image.imageUrl}:`, error);
        results.push({
          imageUrl: image.imageUrl,
          success: false,
          plates: [],
          plateCount: 0,
          allDetectedText: [],
          lowConfidenceIncluded: effectiveConfig.includeLowConfidence ?? false,
          processingTimeMs: 0,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    const response: BatchResponse = { summary: summarizeBatch(results), results };
    return c.json(response);
  });

  app.get("/history/options", async (c) => {
    if (!store) {
      return c.json({ error: "Detection history is not configured" }, 503);
    }
    try {
      const options = await store.getFilterOptions();
      return c.json(options);
    } catch (error) {
      console.error("Error fetching filter options:", error);
      return c.json({ error: "Failed to fetch filter options" }, 500);
    }
  });

  app.get("/history", async (c) => {
    if (!store) {
      return c.json({ error: "Detection history is not configured" }, 503);
    }

    const validationResult = historyQuerySchema.safeParse(c.req.query());
    if (!validationResult.success) {
      return c.json(
        {
          error: "Invalid query parameters",
          details: validationResult.error.flatten(),
        },
        400
      );
    }

    const query = validationResult.data;

    const pagination: ApiPaginationState = {
      pageIndex: query.pageIndex,
      pageSize: query.pageSize,
    };

    const sorting: ApiSortingState = [];
    if (query.sortId) {
      sorting.push({
        id: query.sortId,
        desc:
          query.sortDesc === "true" ||
          (query.sortId === "date" && !query.sortDesc),
      });
    }

    try {
      const result = await store.fetchDetectionHistory(
        pagination,
        sorting,
        buildHistoryFilters(query)
      );
      return c.json(result);
    } catch (error) {
      console.error("Error fetching detection history:", error);
      const errorMessage =
        error instanceof Error ? error.message : "An unknown error occurred";
      return c.json(
        {
          error: "Failed to fetch detection history",
          details: errorMessage,
        },
        500
      );
    }
  });

  return app;
}
