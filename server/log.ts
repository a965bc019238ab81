import { format } from "date-fns";

export type Logger = (message: string) => void;

export function log(message: string, source = "express") {
  const formattedTime = format(new Date(), "h:mm:ss a");
  console.log(`${formattedTime} [${source}] ${message}`);
}

export function createLogger(source: string): Logger {
  return (message) => log(message, source);
}

export const silentLogger: Logger = () => {};
