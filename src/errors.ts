export type ErrorType =
  | "transient" // Network issues, rate limits - retry on the next run
  | "recoverable" // Destination exists, partial migration - can continue
  | "permanent"; // Missing repo, permissions - needs a human

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join("\n  ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export class DiscoveryError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DiscoveryError";
  }
}

export class SlugCollisionError extends Error {
  readonly collisions: Array<{ slug: string; paths: string[] }>;

  constructor(collisions: Array<{ slug: string; paths: string[] }>) {
    const details = collisions
      .map(({ slug, paths }) => `${slug} <- ${paths.join(", ")}`)
      .join("; ");
    super(`Repository paths collide after slugification: ${details}`);
    this.name = "SlugCollisionError";
    this.collisions = collisions;
  }
}

export class SourceApiError extends Error {
  readonly status: number;
  readonly response: string;

  constructor(status: number, statusText: string, response: string) {
    super(`GitLab API error: ${status} ${statusText} - ${response}`);
    this.name = "SourceApiError";
    this.status = status;
    this.response = response;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function classifyError(error: unknown): ErrorType {
  const lowerMessage = errorMessage(error).toLowerCase();

  if (
    lowerMessage.includes("rate limit") ||
    lowerMessage.includes("timeout") ||
    lowerMessage.includes("timed out") ||
    lowerMessage.includes("econnreset") ||
    lowerMessage.includes("enotfound") ||
    lowerMessage.includes("network") ||
    lowerMessage.includes("503") ||
    lowerMessage.includes("502") ||
    lowerMessage.includes("504")
  ) {
    return "transient";
  }

  if (
    lowerMessage.includes("already exists") ||
    lowerMessage.includes("409") ||
    lowerMessage.includes("conflict")
  ) {
    return "recoverable";
  }

  if (
    lowerMessage.includes("not found") ||
    lowerMessage.includes("404") ||
    lowerMessage.includes("forbidden") ||
    lowerMessage.includes("403") ||
    lowerMessage.includes("unauthorized") ||
    lowerMessage.includes("authentication failed") ||
    lowerMessage.includes("401")
  ) {
    return "permanent";
  }

  return "transient";
}
