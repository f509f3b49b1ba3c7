import { pino, destination, LevelWithSilent, Logger } from "pino";

export function getLogLevel( level: string | undefined ): LevelWithSilent {
	switch ( level ) {
		case "trace":
			return "trace";
		case "debug":
			return "debug";
		case "info":
			return "info";
		case "warn":
			return "warn";
		case "error":
			return "error";
		case "fatal":
			return "fatal";
		case "silent":
			return "silent";
		default:
			return "warn";
	}
}

// Standard output is reserved for the report.
export const logger: Logger = pino( { level: getLogLevel( process.env.LOG_LEVEL ) }, destination( 2 ) );
