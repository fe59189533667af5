import pino from "pino";
import { readEnv } from "./config";

let rootLogger: pino.Logger | undefined;

function getRoot(): pino.Logger {
  if (!rootLogger) {
    rootLogger = pino({ level: readEnv().logLevel });
  }
  return rootLogger;
}

export function createLogger(name: string): pino.Logger {
  return getRoot().child({ name });
}
