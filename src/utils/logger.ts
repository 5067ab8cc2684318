import winston from "winston";

const { combine, timestamp, colorize, printf, errors, splat } = winston.format;

const lineFormat = printf(({ level, message, timestamp: time, stack, ...meta }) => {
  const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
  return `${time} - ${level}: ${stack ?? message}${extra}`;
});

// LOG_LEVEL is read directly so logging works before config validation runs
export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || "info",
  silent: process.env.NODE_ENV === "test",
  format: combine(errors({ stack: true }), splat(), timestamp(), lineFormat),
  transports: [
    new winston.transports.Console({
      format: combine(colorize(), lineFormat),
    }),
  ],
});
