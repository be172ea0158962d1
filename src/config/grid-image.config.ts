import { join } from "path";
import { isValidTimezone } from "../common/utils/date.util";
import { UnknownSymbolPolicy } from "../grid/types/state-model.type";

export const GRID_IMAGE_OPTIONS = "GRID_IMAGE_OPTIONS";

export interface GridImageConfig {
  fontDir: string;
  /** IANA timezone deciding "today"; undefined means the process's local zone */
  timezone?: string;
  unknownSymbolPolicy: UnknownSymbolPolicy;
}

type EnvReader = (key: string) => string | undefined;

const processEnv: EnvReader = (key) => process.env[key];

export const getGridImageConfig = (
  env: EnvReader = processEnv,
): GridImageConfig => {
  const timezone = env("GRID_TIMEZONE")?.trim() || undefined;
  if (timezone && !isValidTimezone(timezone)) {
    throw new Error(`GRID_TIMEZONE "${timezone}" is not a valid IANA timezone`);
  }

  const policy = (env("GRID_UNKNOWN_SYMBOL_POLICY") || "coerce").trim();
  if (policy !== "coerce" && policy !== "reject") {
    throw new Error(
      `GRID_UNKNOWN_SYMBOL_POLICY must be "coerce" or "reject", got "${policy}"`,
    );
  }

  return {
    fontDir: env("GRID_FONT_DIR") || join(process.cwd(), "fonts"),
    timezone,
    unknownSymbolPolicy: policy,
  };
};

export interface HttpConfig {
  host: string;
  port: number;
}

export const getHttpConfig = (env: EnvReader = processEnv): HttpConfig => {
  const rawPort = (env("PORT") || "8000").trim();
  const port = /^\d+$/.test(rawPort) ? parseInt(rawPort, 10) : NaN;
  if (!Number.isInteger(port) || port > 65535) {
    throw new Error(`PORT must be an integer from 0 to 65535, got "${rawPort}"`);
  }

  return {
    host: env("HOST") || "0.0.0.0",
    port,
  };
};
