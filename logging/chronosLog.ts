/**
 * Structured logging for conversion events.
 *
 * Emits one JSON object per line so the output can be aggregated.
 */

export type ChronosLogEvent =
  | "solar_term.resolved"
  | "convert.failed"
  | "convert.batch.completed";

export type ChronosLogData = {
  event: ChronosLogEvent;
  target_longitude?: number;
  year?: number;
  epoch_seconds?: number;
  iterations?: number;
  residual_deg?: number;
  provider?: string;
  index?: number;
  count?: number;
  failed?: number;
  error_code?: string;
  error_message?: string;
  [key: string]: unknown;
};

export type ChronosLogger = (data: ChronosLogData) => void;

/**
 * Default sink. `CHRONOS_LOG=silent` mutes it.
 */
export function chronosLog(data: ChronosLogData): void {
  if (process.env.CHRONOS_LOG === "silent") return;

  const logEntry = {
    timestamp: new Date().toISOString(),
    ...data,
  };

  console.log(JSON.stringify(logEntry));
}

export const silentLogger: ChronosLogger = () => {};

export function chronosLogHelpers(log: ChronosLogger) {
  return {
    termResolved(params: {
      provider: string;
      target_longitude: number;
      year: number;
      epoch_seconds: number;
      iterations: number;
      residual_deg: number;
    }): void {
      log({ event: "solar_term.resolved", ...params });
    },

    conversionFailed(params: {
      index: number;
      epoch_seconds: number;
      error_code: string;
      error_message: string;
    }): void {
      log({ event: "convert.failed", ...params });
    },

    batchCompleted(params: { count: number; failed: number }): void {
      log({ event: "convert.batch.completed", ...params });
    },
  };
}
