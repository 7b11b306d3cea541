import type { RecognitionReport } from "./plates";

export interface ApiResponse extends RecognitionReport {
  processingTimeMs: number;
  error: string | null;
}

export interface BatchImageResult extends ApiResponse {
  imageUrl: string;
  success: boolean;
}

export interface BatchSummary {
  totalImages: number;
  successful: number;
  failed: number;
  totalPlatesDetected: number;
  averagePlatesPerImage: number;
}

export interface BatchResponse {
  summary: BatchSummary;
  results: BatchImageResult[];
}
