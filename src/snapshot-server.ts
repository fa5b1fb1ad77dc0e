/**
 * Dashboard feed: every HTTP request gets the current {@link Snapshot} as
 * JSON, and every WebSocket client is pushed a fresh one after each tick.
 *
 * @module snapshot-server
 */

import { createServer, type IncomingMessage, type Server as HttpServer, type ServerResponse } from "http";
import { WebSocket, WebSocketServer } from "ws";
import logger from "./logger.js";
import type { Snapshot } from "./snapshot.js";

export interface SnapshotServerOptions {
	host: string;
	port: number;
	/** Builds the snapshot served for each request and push. */
	snapshot: () => Snapshot;
}

export class SnapshotServer {
	private readonly httpServer: HttpServer;
	private readonly wsServer: WebSocketServer;
	private readonly options: SnapshotServerOptions;
	private isRunning = false;

	constructor(options: SnapshotServerOptions) {
		this.options = options;
		this.httpServer = createServer((req, res) => this.handleHttpRequest(req, res));
		this.wsServer = new WebSocketServer({ server: this.httpServer });
		this.wsServer.on("connection", (ws: WebSocket, req: IncomingMessage) => {
			const address = req.socket.remoteAddress ?? "unknown";
			logger.info(`Dashboard client connected: ${address}`);
			ws.send(this.render());
			ws.on("close", () => logger.info(`Dashboard client disconnected: ${address}`));
			ws.on("error", (error: Error) => logger.warn(`Dashboard client ${address} error: ${error.message}`));
		});
	}

	get clients(): number {
		return this.wsServer.clients.size;
	}

	render(): string {
		return JSON.stringify(this.options.snapshot());
	}

	async start(): Promise<void> {
		if (this.isRunning) throw new Error("Snapshot server is already running");
		return new Promise((resolve, reject) => {
			this.httpServer.once("error", reject);
			this.httpServer.listen(this.options.port, this.options.host, () => {
				this.isRunning = true;
				logger.info(`Snapshot server listening on http://${this.options.host}:${this.options.port}`);
				resolve();
			});
		});
	}

	async stop(): Promise<void> {
		if (!this.isRunning) return;
		for (const client of this.wsServer.clients) client.terminate();
		return new Promise((resolve) => {
			this.wsServer.close(() => {
				this.httpServer.close(() => {
					this.isRunning = false;
					logger.info("Snapshot server stopped");
					resolve();
				});
			});
		});
	}

	/** Sends the current snapshot to every open WebSocket client. */
	push(): void {
		if (this.wsServer.clients.size === 0) return;
		const payload = this.render();
		for (const client of this.wsServer.clients) {
			if (client.readyState === WebSocket.OPEN) client.send(payload);
		}
	}

	private handleHttpRequest(_req: IncomingMessage, res: ServerResponse): void {
		try {
			const body = this.render();
			res.writeHead(200, { "Content-Type": "application/json", "Cache-Control": "no-store" });
			res.end(body);
		} catch (error) {
			logger.error(`Failed to build snapshot: ${error}`);
			res.writeHead(500, { "Content-Type": "text/plain" });
			res.end("Failed to build snapshot");
		}
	}
}
