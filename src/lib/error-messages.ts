// src/lib/error-messages.ts
export const ERR_MSG = {
  BAD_INPUT_SCHEMA: "Request validation failed",
  BAD_QUERY_PARAMS: "Invalid query parameters",
  BAD_PATH_PARAMS: "Invalid path parameters",
  API_KEY_REQUIRED: "API key is required. Provide X-API-Key header.",
  API_KEY_INVALID: "Invalid API key",
  TASK_NOT_FOUND: "Task not found",
  TASK_NOT_COMPLETED: "Task not completed yet",
  OUTPUT_NOT_FOUND: "Output file not found",
  TASK_ALREADY_FINISHED: "Task cannot be cancelled in {status} state",
  VIDEO_INFO_UNAVAILABLE: "Could not get video information. Please check the URL.",
  UNKNOWN_SOURCE: "Unknown or disabled source '{sourceId}'",
  UNKNOWN_FORMAT: "Unknown video format '{format}'",
  TOO_MANY_PENDING: "Too many pending tasks. Please wait and try again.",
  SHUTTING_DOWN: "Service is shutting down. Please try again shortly.",
  QUOTA_DAILY_LIMIT: "Daily limit reached ({limit} tasks/day for {tier} tier). Upgrade to increase limit.",
  QUOTA_CONCURRENT: "Concurrent task limit reached ({limit} for {tier} tier). Wait for a task to finish.",
  QUOTA_QUEUED: "Daily limit would be exceeded by tasks already queued ({remaining} remaining today).",
  QUOTA_MODE: "Processing mode '{mode}' not available for {tier} tier. Upgrade to access this feature.",
  QUOTA_RESOLUTION: "Resolution '{resolution}' not available for {tier} tier. Max: {max}. Upgrade for higher quality.",
  TIER_NOT_FOUND: "Tier '{tierId}' not found or tier config file missing",
  SOURCE_NOT_FOUND: "Source not found",
  ROUTE_NOT_FOUND: "Route not found",
  NOT_SAVED: "The change could not be saved and may be lost on restart",
  INTERNAL_UNEXPECTED: "Something went wrong",
} as const;

export type ErrKey = keyof typeof ERR_MSG;

export function msg(key: ErrKey): string {
  return ERR_MSG[key];
}

// Optional tiny templating for limits/caps
export function fmt(key: ErrKey, vars: Record<string, string | number> = {}): string {
  let s: string = ERR_MSG[key];
  for (const [k, v] of Object.entries(vars)) s = s.replace(new RegExp(`{${k}}` , "g"), String(v));
  return s;
}
