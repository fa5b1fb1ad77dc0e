import { suite, test, after } from "node:test";
import assert from "node:assert";
import { MemoryRecordStore } from "./core/records.js";
import { YamlRecordStore } from "./package/records.js";
import { defaultConfig, setConfig } from "./registry/config.js";
import { openRecords } from "./game.js";

suite("game.ts", () => {
	after(() => {
		setConfig(defaultConfig());
	});

	test("openRecords follows the active storage driver", () => {
		const config = defaultConfig();
		config.storage.driver = "memory";
		setConfig(config);
		assert.ok(openRecords() instanceof MemoryRecordStore);

		setConfig(defaultConfig());
		assert.ok(openRecords() instanceof YamlRecordStore);
	});
});
