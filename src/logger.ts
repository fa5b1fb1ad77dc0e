/**
 * Logger module - structured application logging
 *
 * Preconfigured Winston logger shared by every module of the realm.
 *
 * Transports
 * - File (errors): `logs/error-YYYY-MM-DD-HHMMSS[.test].log` at level `error`
 * - File (app):    `logs/app-YYYY-MM-DD-HHMMSS[.test].log` at level `debug`
 * - Console: colorized output at `LOG_LEVEL` (default `info`), disabled when
 *   `process.env.NODE_TEST_CONTEXT` is set
 *
 * @example
 * ```ts
 * import logger from "./logger.js";
 *
 * logger.info("Connected to %s", network.name);
 * logger.warn("Dispatch queue overflow", { network: "libera" });
 * ```
 *
 * @module logger
 */
import winston from "winston";
import path from "path";
import { fileURLToPath } from "url";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// set by the node:test runner in every test process
const isTestMode = process.env.NODE_TEST_CONTEXT;

// log file names carry the process start time
const [date, time] = new Date().toISOString().split("T");
const HMS = time.split(".")[0].split(":").join("");
const testSuffix = isTestMode ? ".test" : "";

/** logs/ sits at the project root, both from src/ and from dist/src/ */
function logDirectory(): string {
	const parent = path.join(__dirname, "..");
	return path.basename(parent) === "dist"
		? path.join(parent, "..", "logs")
		: path.join(parent, "logs");
}

const fileFormat = winston.format.combine(
	winston.format.uncolorize(),
	winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
	winston.format.printf(
		({ timestamp, level, message, ...meta }) =>
			`[${timestamp}] ${level.toUpperCase()}: ${message}${
				Object.keys(meta).length ? " " + JSON.stringify(meta) : ""
			}`
	)
);

const logger = winston.createLogger({
	level: "debug",
	format: winston.format.combine(
		winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
		winston.format.errors({ stack: true }),
		winston.format.splat(),
		winston.format.json()
	),
	defaultMeta: { service: "idle-realm" },
	transports: [
		new winston.transports.File({
			filename: path.join(logDirectory(), `error-${date}-${HMS}${testSuffix}.log`),
			level: "error",
			format: fileFormat,
		}),
		new winston.transports.File({
			filename: path.join(logDirectory(), `app-${date}-${HMS}${testSuffix}.log`),
			level: "debug",
			format: fileFormat,
		}),
		...(!isTestMode
			? [
					new winston.transports.Console({
						level: process.env.LOG_LEVEL || "info",
						format: winston.format.combine(
							winston.format.colorize(),
							winston.format.timestamp({ format: "HH:mm:ss" }),
							winston.format.printf(
								({ timestamp, level, message, service, ...meta }) =>
									`[${timestamp}] ${level}: ${message}${
										Object.keys(meta).length ? " " + JSON.stringify(meta) : ""
									}`
							)
						),
					}),
			  ]
			: []),
	],
});

export default logger;
