import { Type as t } from "@sinclair/typebox";

import { buildConfigFactoryEnv, envNumber } from "~shared/ConfigFactory";

export const getAppConfig = buildConfigFactoryEnv(
  t.Object({
    GEOCODE_CACHE_PATH: t.String({ default: "geocode-cache.json" }),
    NOMINATIM_URL: t.String({
      default: "https://nominatim.openstreetmap.org",
    }),
    NOMINATIM_USER_AGENT: t.String({ default: "media-tidy" }),
    GEOCODE_ATTEMPTS: envNumber({ default: 3, minimum: 1 }),
    GEOCODE_BACKOFF_MS: envNumber({ default: 1000, minimum: 0 }),
    GEOCODE_TIMEOUT_MS: envNumber({ default: 10_000, minimum: 1 }),
    REPORT_DIR: t.String({ default: "dist/reports" }),
  })
);

export type AppConfig = ReturnType<typeof getAppConfig>;
