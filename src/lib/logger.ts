import pino, { type TransportSingleOptions } from "pino";

const env = process.env.NODE_ENV || "development";
const level = process.env.LOG_LEVEL || (env === "production" ? "info" : env === "test" ? "silent" : "debug");

let transport: TransportSingleOptions | undefined;
if (env !== "production" && env !== "test") {
  try {
    require.resolve("pino-pretty");
    transport = {
      target: "pino-pretty",
      options: {
        colorize: true,
      },
    };
  } catch {
    transport = undefined;
  }
}

export const logger = pino({ level, transport });
