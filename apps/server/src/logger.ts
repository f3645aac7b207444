import bunyan from "bunyan";

const LEVELS: readonly string[] = ["trace", "debug", "info", "warn", "error", "fatal"];

function isLevel(value: string): value is bunyan.LogLevelString {
  return LEVELS.includes(value);
}

const level = process.env.LOG_LEVEL ?? "info";

const log = bunyan.createLogger({
  name: "rps-arena-server",
  level: isLevel(level) ? level : "info",
});

export default log;
