/**
 * Static game content: unique items, quest flavor and event texts.
 *
 * The tables live in `data/content.json`; this module loads them once and
 * checks their shape so the rest of the game can rely on the types.
 *
 * @module core/content
 */

import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { basename, dirname, join } from "path";
import { isItemSlot, type ItemSlot } from "./player.js";

export interface UniqueItem {
	name: string;
	slot: ItemSlot;
	minLevel: number;
	/** Exclusive. */
	maxLevel: number;
	requiredLevel: number;
	flavor: string;
}

export type QuestKind = "time" | "grid";

export interface QuestTemplate {
	kind: QuestKind;
	text: string;
}

export interface FortuneTexts {
	/** Slot-specific lines used when an item changes level. */
	items: Partial<Record<ItemSlot, string>>;
	texts: string[];
}

export interface GameContent {
	uniqueItems: UniqueItem[];
	quests: QuestTemplate[];
	calamity: FortuneTexts;
	godsend: FortuneTexts;
}

function isObject(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
	return Array.isArray(value) && value.every((entry) => typeof entry === "string");
}

function parseUniqueItem(value: unknown): UniqueItem {
	if (
		!isObject(value) ||
		typeof value.name !== "string" ||
		!isItemSlot(value.slot) ||
		typeof value.minLevel !== "number" ||
		typeof value.maxLevel !== "number" ||
		typeof value.requiredLevel !== "number" ||
		typeof value.flavor !== "string"
	)
		throw new Error(`invalid unique item ${JSON.stringify(value)}`);
	return {
		name: value.name,
		slot: value.slot,
		minLevel: value.minLevel,
		maxLevel: value.maxLevel,
		requiredLevel: value.requiredLevel,
		flavor: value.flavor,
	};
}

function parseQuest(value: unknown): QuestTemplate {
	if (!isObject(value) || typeof value.text !== "string" || (value.kind !== "time" && value.kind !== "grid"))
		throw new Error(`invalid quest ${JSON.stringify(value)}`);
	return { kind: value.kind, text: value.text };
}

function parseFortune(value: unknown): FortuneTexts {
	if (!isObject(value) || !isObject(value.items) || !isStringArray(value.texts))
		throw new Error("invalid event texts");
	const items: Partial<Record<ItemSlot, string>> = {};
	for (const [slot, text] of Object.entries(value.items)) {
		if (!isItemSlot(slot) || typeof text !== "string") throw new Error(`invalid item text for ${slot}`);
		items[slot] = text;
	}
	return { items, texts: value.texts };
}

export function parseContent(value: unknown): GameContent {
	if (!isObject(value) || !Array.isArray(value.uniqueItems) || !Array.isArray(value.quests))
		throw new Error("content must list uniqueItems and quests");
	return {
		uniqueItems: value.uniqueItems.map(parseUniqueItem),
		quests: value.quests.map(parseQuest),
		calamity: parseFortune(value.calamity),
		godsend: parseFortune(value.godsend),
	};
}

/** data/content.json at the project root, from src/core/ or dist/src/core/ */
function contentPath(): string {
	const root = join(dirname(fileURLToPath(import.meta.url)), "..", "..");
	const projectRoot = basename(root) === "dist" ? join(root, "..") : root;
	return join(projectRoot, "data", "content.json");
}

export const CONTENT: GameContent = parseContent(JSON.parse(readFileSync(contentPath(), "utf-8")));

/** Replaces `{player}` in a content line. */
export function fill(template: string, player: string): string {
	return template.split("{player}").join(player);
}
