import pino from "pino";

import { getEnv } from "@/config/env";

const env = getEnv();

export const logger = pino({
  name: "recipe-markdown",
  level: env.LOG_LEVEL,
  base: { env: env.NODE_ENV },
});

export const parserLogger = logger.child({ module: "parser" });
export const rendererLogger = logger.child({ module: "renderer" });
