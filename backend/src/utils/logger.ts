import winston from "winston";
import path from "path";

const logDir = process.env.LOG_DIR;

const logFormat = winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const extra = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : "";
    return `${timestamp} [${level}]: ${message}${extra}`;
});

// File output is opt-in; containers usually only want stdout
const fileTransports = logDir
    ? [
          new winston.transports.File({
              filename: path.join(logDir, "error.log"),
              level: "error",
              format: winston.format.json(),
              maxsize: 5242880, // 5MB
              maxFiles: 5,
          }),
          new winston.transports.File({
              filename: path.join(logDir, "combined.log"),
              format: winston.format.json(),
              maxsize: 5242880,
              maxFiles: 5,
          }),
      ]
    : [];

export const logger = winston.createLogger({
    level:
        process.env.LOG_LEVEL ||
        (process.env.NODE_ENV === "production" ? "info" : "debug"),
    silent: process.env.NODE_ENV === "test",
    format: winston.format.combine(
        winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
        winston.format.errors({ stack: true }),
        winston.format.splat()
    ),
    transports: [
        new winston.transports.Console({
            format: winston.format.combine(winston.format.colorize(), logFormat),
        }),
        ...fileTransports,
    ],
    exitOnError: false,
});
