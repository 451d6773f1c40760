import isEmpty from "lodash/isEmpty";
import type { SubschemaConfig } from "./config";

// ─── Logger ──────────────────────────────────────────────────────────────────
//
// Une ligne par enregistrement sur stderr :
//   [semantic-subschema] warn: message {"key":"value"}
//
// `debug` et `info` ne sont émis que si le mode debug est actif.

export type LogLevel = "debug" | "info" | "warn";

export type LogMeta = Record<string, unknown>;

export interface Logger {
	debug(message: string, meta?: LogMeta): void;
	info(message: string, meta?: LogMeta): void;
	warn(message: string, meta?: LogMeta): void;
}

export type LogSink = (line: string) => void;

const PREFIX = "[semantic-subschema]";

const stderrSink: LogSink = (line) => {
	process.stderr.write(line);
};

export function formatLogLine(
	level: LogLevel,
	message: string,
	meta?: LogMeta,
): string {
	const suffix = meta && !isEmpty(meta) ? ` ${JSON.stringify(meta)}` : "";
	return `${PREFIX} ${level}: ${message}${suffix}\n`;
}

/**
 * Crée un logger lié à une configuration. Le niveau est relu à chaque
 * appel : basculer `setDebug` prend effet immédiatement.
 */
export function createLogger(
	config: SubschemaConfig,
	sink: LogSink = stderrSink,
): Logger {
	return {
		debug(message, meta) {
			if (config.isDebugEnabled()) sink(formatLogLine("debug", message, meta));
		},
		info(message, meta) {
			if (config.isDebugEnabled()) sink(formatLogLine("info", message, meta));
		},
		warn(message, meta) {
			sink(formatLogLine("warn", message, meta));
		},
	};
}

/** Logger muet, pour les composants utilisés hors d'un checker. */
export const silentLogger: Logger = {
	debug() {},
	info() {},
	warn() {},
};
