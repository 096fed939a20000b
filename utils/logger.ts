import pino, { Logger } from "pino";
import { variables } from "./environment";

export type { Logger };

export const logger: Logger = pino({
  name: "hostname-encoder",
  level: variables.HOSTNAME_ENCODER_LOG_LEVEL,
});
