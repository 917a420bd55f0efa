import * as Sentry from "@sentry/node";

let enabled = false;

/**
 * Initialize the Sentry SDK. Call once at startup, before anything else can
 * throw. Without a DSN Sentry stays disabled and capture calls are no-ops.
 */
export function initSentry(dsn: string | undefined, environment = "development"): void {
  if (!dsn) {
    enabled = false;
    return;
  }

  Sentry.init({
    dsn,
    environment,
    release: process.env.SENTRY_RELEASE ?? undefined,
    tracesSampleRate: environment === "production" ? 0.1 : 1.0,
    integrations: [Sentry.dedupeIntegration()],
    // Strip query strings from HTTP breadcrumbs; provider URLs can carry tokens
    beforeBreadcrumb(breadcrumb) {
      const url = breadcrumb.data?.url;
      if (breadcrumb.category === "http" && typeof url === "string" && breadcrumb.data) {
        try {
          const parsed = new URL(url);
          parsed.search = "";
          breadcrumb.data.url = parsed.toString();
        } catch {
          // relative or malformed URL: nothing to strip
        }
      }
      return breadcrumb;
    },
  });
  enabled = true;
}

/** Capture an exception, tagged with the fleet it concerns. */
export function captureError(
  error: unknown,
  context?: {
    fleetId?: string;
    source?: string;
    extra?: Record<string, unknown>;
  },
): void {
  if (!enabled) return;
  Sentry.captureException(error, {
    tags: {
      ...(context?.fleetId && { fleetId: context.fleetId }),
      ...(context?.source && { source: context.source }),
    },
    extra: context?.extra,
  });
}
