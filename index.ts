import logger from "./src/logger.js";
import { StorageCorruptionError } from "./src/core/errors.js";
import { startGame } from "./src/game.js";

let stopGame: () => Promise<void>;
try {
	stopGame = await startGame();
} catch (error) {
	if (error instanceof StorageCorruptionError) {
		logger.error(`Refusing to start: ${error.message}`);
		process.exit(1);
	}
	throw error;
}

let stopping = false;
async function shutdown(signal: string): Promise<void> {
	if (stopping) return;
	stopping = true;
	logger.info(`Received ${signal}, shutting down...`);
	try {
		await stopGame();
		process.exit(0);
	} catch (error) {
		logger.error("Error during shutdown:", error);
		process.exit(1);
	}
}

process.on("SIGINT", () => void shutdown("SIGINT"));
process.on("SIGTERM", () => void shutdown("SIGTERM"));
