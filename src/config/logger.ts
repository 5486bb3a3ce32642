import pino from "pino";

// Logs go to stderr so command output on stdout stays clean
export function createLogger(level = "info", name?: string): pino.Logger {
  if (process.env["NODE_ENV"] === "production") {
    return pino({ level, name }, pino.destination(2));
  }
  return pino({
    level,
    name,
    transport: {
      target: "pino-pretty",
      options: { colorize: true, destination: 2 },
    },
  });
}
