import morgan from "morgan";
import chalk from "chalk";
import { logger } from "../utils/logger";

morgan.token("colored-method", (req) => {
  const method = req.method ?? "";
  return method === "POST" ? chalk.yellow(method) : chalk.green(method);
});

morgan.token("colored-status", (_req, res) => {
  const status = res.statusCode;
  if (status >= 500) return chalk.red(status);
  if (status >= 400) return chalk.yellow(status);
  return chalk.green(status);
});

// winston adds the timestamp
const ACCESS_LOG_FORMAT = `:colored-method ${chalk.cyan(":url")} :colored-status - ${chalk.magenta(
  ":response-time ms"
)}`;

export const requestLogger = morgan(ACCESS_LOG_FORMAT, {
  skip: () => logger.silent === true,
  stream: { write: (line: string) => logger.info(line.trimEnd()) },
});
