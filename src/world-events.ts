/**
 * Random world events: Hand of God, duels, fortunes, team battles and the
 * quest lifecycle.
 *
 * Everything here runs inside a player store transaction and draws its
 * randomness from the table's injected {@link Random}. Each operation
 * returns the broadcasts it produced; nothing is sent from here.
 *
 * @module world-events
 */

import logger from "./logger.js";
import { toAll, type Broadcast } from "./core/broadcast.js";
import { CONTENT, fill, type FortuneTexts, type GameContent } from "./core/content.js";
import { EVENT_KIND } from "./core/event.js";
import { fmtTime, joinNames } from "./core/format.js";
import { penaltyFor, PENALTY_KIND } from "./core/penalty.js";
import {
	battlePower,
	ITEM_SLOTS,
	itemLevel,
	utag,
	type ItemSlot,
	type OnlinePlayer,
	type Player,
} from "./core/player.js";
import {
	currentWaypoint,
	isQuester,
	type ActiveQuest,
	type Point,
	type QuestState,
	type WorldState,
} from "./core/world.js";
import type { PlayerTable } from "./player-store.js";
import type { ProgressReport } from "./progression.js";

const DAY = 86400;
const HOUR_MS = 3600 * 1000;

/** Average days between occurrences per eligible online player. */
export const EVENT_PERIOD_DAYS = {
	handOfGod: 20,
	teamBattle: 24,
	calamity: 8,
	godsend: 4,
	evilness: 8,
	goodness: 12,
} as const;

export const TOP_REPORT_SECONDS = 36000;
export const HIGH_LEVEL_BATTLE_SECONDS = 1200;

/** Whether a multiple of `period` lies in `(from, to]`. */
export function crossed(from: number, to: number, period: number): boolean {
	return Math.floor(from / period) !== Math.floor(to / period);
}
export const HIGH_LEVEL = 45;
export const QUEST_MIN_LEVEL = 40;
export const QUEST_MIN_ONLINE_MS = 10 * HOUR_MS;
export const QUEST_SIZE = 4;
export const QUEST_FAIL_DELAY_MS = 12 * HOUR_MS;
export const TIME_QUEST_REST_MS = 6 * HOUR_MS;
export const GRID_QUEST_REST_MS = 1 * HOUR_MS;

export interface EventEngineOptions {
	intervalSeconds: number;
	limitPen: number;
	mapWidth: number;
	mapHeight: number;
	content?: GameContent;
}

export interface DuelOptions {
	/** The pair met on the map rather than by challenge. */
	collision?: boolean;
}

export interface StolenItem {
	slot: ItemSlot;
	/** Level the winner now holds. */
	taken: number;
	/** Level the winner left behind. */
	left: number;
}

/** Same ordering as the leaderboard: level desc, countdown asc. */
export function byRank(a: Pick<Player, "id" | "level" | "ttl">, b: Pick<Player, "id" | "level" | "ttl">): number {
	return b.level - a.level || a.ttl - b.ttl || a.id - b.id;
}

function nextLevelLine(player: Player): Broadcast {
	return toAll(`${utag(player)} reaches next level in ${fmtTime(player.ttl)}.`);
}

function percentOf(percent: number, seconds: number): number {
	return Math.floor((percent * seconds) / 100);
}

export class EventEngine {
	private readonly content: GameContent;

	constructor(private readonly options: EventEngineOptions) {
		this.content = options.content ?? CONTENT;
	}

	/** Everything that follows progression in one tick. */
	run(table: PlayerTable, world: WorldState, progress: ProgressReport): Broadcast[] {
		const broadcasts: Broadcast[] = [];
		const guarded = (label: string, step: () => Broadcast[]) => {
			try {
				broadcasts.push(...step());
			} catch (error) {
				logger.error(`World event step "${label}" failed`, { error: String(error) });
			}
		};

		for (const player of progress.levelled) guarded("levelup battle", () => this.levelUpChallenge(table, player));
		guarded("random events", () => this.rollRandomEvents(table));
		guarded("collisions", () => this.resolveCollisions(table, progress.collisions));

		const previous = world.elapsed;
		world.elapsed += this.options.intervalSeconds;
		if (crossed(previous, world.elapsed, TOP_REPORT_SECONDS)) guarded("top report", () => this.announceTop(table));
		if (crossed(previous, world.elapsed, HIGH_LEVEL_BATTLE_SECONDS))
			guarded("high level battle", () => this.highLevelBattle(table));

		guarded("quest", () => this.advanceQuest(table, world));
		return broadcasts;
	}

	rollRandomEvents(table: PlayerTable): Broadcast[] {
		const online = table.online();
		if (online.length === 0) return [];
		const random = table.random;
		const n = online.length;
		const evil = online.filter((p) => p.alignment === "evil").length;
		const good = online.filter((p) => p.alignment === "good").length;
		const odds = (count: number, days: number) => count / ((days * DAY) / this.options.intervalSeconds);

		const broadcasts: Broadcast[] = [];
		if (random.chance(odds(n, EVENT_PERIOD_DAYS.handOfGod))) broadcasts.push(...this.handOfGod(table));
		if (random.chance(odds(n, EVENT_PERIOD_DAYS.teamBattle))) broadcasts.push(...this.teamBattle(table));
		if (random.chance(odds(n, EVENT_PERIOD_DAYS.calamity))) broadcasts.push(...this.calamity(table));
		if (random.chance(odds(n, EVENT_PERIOD_DAYS.godsend))) broadcasts.push(...this.godsend(table));
		if (random.chance(odds(evil, EVENT_PERIOD_DAYS.evilness))) broadcasts.push(...this.evilness(table));
		if (random.chance(odds(good, EVENT_PERIOD_DAYS.goodness))) broadcasts.push(...this.goodness(table));
		return broadcasts;
	}

	/**
	 * One online player, chosen uniformly, is carried 5-75% of their
	 * countdown toward the next level (80%) or away from it (20%).
	 */
	handOfGod(table: PlayerTable): Broadcast[] {
		const random = table.random;
		const player = random.pick(table.online());
		if (!player) return [];
		const helping = random.int(0, 4) > 0;
		const amount = percentOf(5 + random.int(0, 70), player.ttl);
		let message: string;
		if (helping) {
			player.ttl = Math.max(0, player.ttl - amount);
			message = `Verily I say unto thee, the Heavens have burst forth, and the blessed hand of God carried ${utag(player)} ${fmtTime(amount)} toward level ${player.level + 1}.`;
		} else {
			player.ttl += amount;
			message = `Thereupon He stretched out His little finger among them and consumed ${utag(player)} with fire, slowing the heathen ${fmtTime(amount)} from level ${player.level + 1}.`;
		}
		table.logEvent(EVENT_KIND.HOG, message, player.id);
		return [toAll(message), nextLevelLine(player)];
	}

	levelUpChallenge(table: PlayerTable, player: OnlinePlayer): Broadcast[] {
		const opponents = table.online().filter((p) => p.id !== player.id);
		if (opponents.length === 0) return [];
		if (player.level < 25 && !table.random.chance(0.25)) return [];
		const opponent = table.random.pick(opponents);
		return opponent ? this.duel(table, player, opponent) : [];
	}

	resolveCollisions(table: PlayerTable, collisions: ReadonlyArray<readonly [Player, Player]>): Broadcast[] {
		const broadcasts: Broadcast[] = [];
		const n = table.online().length;
		for (const [challenger, opponent] of collisions) {
			if (n < 2 || !table.random.chance(1 / n)) continue;
			broadcasts.push(...this.duel(table, challenger, opponent, { collision: true }));
		}
		return broadcasts;
	}

	/**
	 * Each side rolls up to its battle power; the challenger wins ties.
	 * A win shrinks the winner's countdown and may land a critical strike
	 * or an item theft; a loss grows the challenger's countdown.
	 */
	duel(table: PlayerTable, challenger: Player, opponent: Player, options: DuelOptions = {}): Broadcast[] {
		if (challenger.id === opponent.id) return [];
		const random = table.random;
		const cPower = battlePower(challenger);
		const oPower = battlePower(opponent);
		const cRoll = random.int(0, Math.max(cPower - 1, 0));
		const oRoll = random.int(0, Math.max(oPower - 1, 0));
		const won = cRoll >= oRoll;
		const [winner, loser] = won ? [challenger, opponent] : [opponent, challenger];
		const c = `${utag(challenger)} [${cRoll}/${cPower}]`;
		const o = `${utag(opponent)} [${oRoll}/${oPower}]`;
		const verb = options.collision
			? `${c} has come upon ${o} and ${won ? "taken them in" : "been defeated in"} combat!`
			: `${c} has challenged ${o} in combat and ${won ? "won" : "lost"}!`;

		const broadcasts: Broadcast[] = [];
		let message: string;
		if (won) {
			const gain = Math.floor((Math.max(loser.level / 4, 7) / 100) * winner.ttl);
			winner.ttl = Math.max(0, winner.ttl - gain);
			message = `${verb} ${fmtTime(gain)} is removed from ${utag(winner)}'s clock.`;
			broadcasts.push(toAll(message), nextLevelLine(winner));

			const critOdds = challenger.alignment === "good" ? 50 : challenger.alignment === "evil" ? 20 : 35;
			if (random.int(0, critOdds - 1) < 1) {
				const crit = percentOf(5 + random.int(0, 19), loser.ttl);
				loser.ttl += crit;
				const strike = `${utag(winner)} dealt ${utag(loser)} a Critical Strike! ${fmtTime(crit)} added to ${utag(loser)}'s clock.`;
				table.logEvent(EVENT_KIND.CRITICAL, strike, winner.id, loser.id);
				broadcasts.push(toAll(strike));
			} else if (random.int(0, 24) < 1 && winner.level > 19) {
				const stolen = this.stealItem(table, winner, loser);
				if (stolen) {
					const text = `In battle, ${utag(loser)} dropped their level ${stolen.taken} ${stolen.slot}! ${utag(winner)} picks it up, tossing their old level ${stolen.left} ${stolen.slot}.`;
					table.logEvent(EVENT_KIND.STEAL, text, winner.id, loser.id);
					broadcasts.push(toAll(text));
				}
			}
		} else {
			const loss = Math.floor((Math.max(challenger.level / 7, 7) / 100) * challenger.ttl);
			challenger.ttl += loss;
			message = `${verb} ${fmtTime(loss)} is added to ${utag(challenger)}'s clock.`;
			broadcasts.push(toAll(message), nextLevelLine(challenger));
		}
		table.logEvent(EVENT_KIND.BATTLE, message, challenger.id, opponent.id);
		return broadcasts;
	}

	/** Swaps one slot where the loser holds the better item. */
	stealItem(table: PlayerTable, winner: Player, loser: Player): StolenItem | undefined {
		const candidates = ITEM_SLOTS.filter((slot) => itemLevel(loser, slot) > itemLevel(winner, slot));
		const slot = table.random.pick(candidates);
		if (!slot) return undefined;
		const taken = itemLevel(loser, slot);
		const left = itemLevel(winner, slot);
		table.setItem(winner, slot, taken);
		table.setItem(loser, slot, left);
		return { slot, taken, left };
	}

	calamity(table: PlayerTable): Broadcast[] {
		return this.fortune(table, this.content.calamity, -1);
	}

	godsend(table: PlayerTable): Broadcast[] {
		return this.fortune(table, this.content.godsend, 1);
	}

	/**
	 * 10% of the time an item gains or loses a tenth of its level;
	 * otherwise the countdown moves 5-12%.
	 */
	private fortune(table: PlayerTable, texts: FortuneTexts, sign: 1 | -1): Broadcast[] {
		const random = table.random;
		const player = random.pick(table.online());
		if (!player) return [];
		const kind = sign > 0 ? EVENT_KIND.GODSEND : EVENT_KIND.CALAMITY;
		const tag = utag(player);

		if (random.chance(0.1)) {
			const slots = ITEM_SLOTS.filter((slot) => texts.items[slot] !== undefined);
			const slot = random.pick(slots);
			const line = slot ? texts.items[slot] : undefined;
			if (slot && line) {
				const current = itemLevel(player, slot);
				if (current > 0) table.setItem(player, slot, Math.round(current * (1 + sign * 0.1)), player.items[slot]?.name);
				const message = `${fill(line, tag)}! ${tag}'s ${slot} ${sign > 0 ? "gains" : "loses"} 10% effectiveness.`;
				table.logEvent(kind, message, player.id);
				return [toAll(message)];
			}
		}

		const amount = percentOf(5 + random.int(0, 7), player.ttl);
		const line = fill(random.pick(texts.texts) ?? "{player} felt the hand of fate", tag);
		let message: string;
		if (sign > 0) {
			player.ttl = Math.max(0, player.ttl - amount);
			message = `${line}! This godsend accelerated them ${fmtTime(amount)} towards level ${player.level + 1}.`;
		} else {
			player.ttl += amount;
			message = `${line}. This calamity slowed them ${fmtTime(amount)} from level ${player.level + 1}.`;
		}
		table.logEvent(kind, message, player.id);
		return [toAll(message), nextLevelLine(player)];
	}

	/** Two good players pray together and lose 5-12% of their countdown. */
	goodness(table: PlayerTable): Broadcast[] {
		const random = table.random;
		const pair = random.sample(
			table.online().filter((p) => p.alignment === "good"),
			2
		);
		if (pair.length < 2) return [];
		const gain = 5 + random.int(0, 7);
		const message = `${utag(pair[0])} and ${utag(pair[1])} have prayed together. ${gain}% of their time is removed.`;
		const broadcasts = [toAll(message)];
		for (const player of pair) {
			player.ttl = Math.floor(player.ttl * (1 - gain / 100));
			broadcasts.push(nextLevelLine(player));
		}
		table.logEvent(EVENT_KIND.GODSEND, message, pair[0].id, pair[1].id);
		return broadcasts;
	}

	/** An evil player either robs a good one or is punished by their god. */
	evilness(table: PlayerTable): Broadcast[] {
		const random = table.random;
		const online = table.online();
		const player = random.pick(online.filter((p) => p.alignment === "evil"));
		if (!player) return [];
		if (random.chance(0.5)) {
			const target = random.pick(online.filter((p) => p.alignment === "good"));
			if (!target) return [];
			const stolen = this.stealItem(table, player, target);
			if (!stolen) return [];
			const message = `${utag(player)} stole ${utag(target)}'s level ${stolen.taken} ${stolen.slot}! Leaves their old level ${stolen.left} ${stolen.slot} behind.`;
			table.logEvent(EVENT_KIND.STEAL, message, player.id, target.id);
			return [toAll(message)];
		}
		const amount = percentOf(1 + random.int(0, 4), player.ttl);
		player.ttl += amount;
		const message = `${utag(player)} is forsaken by their evil god. ${fmtTime(amount)} added to their clock.`;
		table.logEvent(EVENT_KIND.CALAMITY, message, player.id);
		return [toAll(message), nextLevelLine(player)];
	}

	/** Three against three; the first team's clocks move by 20% of its lowest countdown. */
	teamBattle(table: PlayerTable): Broadcast[] {
		const random = table.random;
		const picked = random.sample(table.online(), 6);
		if (picked.length < 6) return [];
		const teamA = picked.slice(0, 3);
		const teamB = picked.slice(3);
		const powerA = teamA.reduce((sum, p) => sum + battlePower(p), 0);
		const powerB = teamB.reduce((sum, p) => sum + battlePower(p), 0);
		const rollA = random.int(0, Math.max(powerA - 1, 0));
		const rollB = random.int(0, Math.max(powerB - 1, 0));
		const won = rollA >= rollB;
		const amount = Math.floor(Math.min(...teamA.map((p) => p.ttl)) * 0.2);
		for (const player of teamA) {
			player.ttl = won ? Math.max(0, player.ttl - amount) : player.ttl + amount;
		}
		const message =
			`${joinNames(teamA.map(utag))} [${rollA}/${powerA}] team battled ${joinNames(teamB.map(utag))} [${rollB}/${powerB}] and ${won ? "won" : "lost"}! ` +
			`${fmtTime(amount)} ${won ? "removed from" : "added to"} their clocks.`;
		table.logEvent(EVENT_KIND.TEAM_BATTLE, message);
		return [toAll(message)];
	}

	/** Runs when more than 15% of online players are level 45 or higher. */
	highLevelBattle(table: PlayerTable): Broadcast[] {
		const online = table.online();
		const high = online.filter((p) => p.level >= HIGH_LEVEL);
		if (high.length === 0 || high.length / online.length <= 0.15) return [];
		const challenger = table.random.pick(high);
		if (!challenger) return [];
		const opponent = table.random.pick(online.filter((p) => p.id !== challenger.id));
		return opponent ? this.duel(table, challenger, opponent) : [];
	}

	announceTop(table: PlayerTable): Broadcast[] {
		const top = table.all().sort(byRank).slice(0, 3);
		if (top.length === 0) return [];
		return [
			toAll("Idle RPG Top Players:"),
			...top.map((p, i) =>
				toAll(`${utag(p)}, the level ${p.level} ${p.className}, is #${i + 1}! Next level in ${fmtTime(p.ttl)}.`)
			),
		];
	}

	/** Completes, or starts, the world's quest. */
	advanceQuest(table: PlayerTable, world: WorldState): Broadcast[] {
		const quest = world.quest;
		const now = table.now;
		if (quest.status === "idle") {
			return now > quest.nextAt ? this.startQuest(table, world) : [];
		}
		const questers = quest.questers.map((id) => table.get(id)).filter((p): p is Player => p !== undefined);
		if (questers.length === 0) {
			world.quest = { status: "idle", nextAt: now + GRID_QUEST_REST_MS };
			logger.info("Quest dissolved: no questers remain");
			return [];
		}
		if (quest.kind === "time") {
			if (now <= quest.endsAt) return [];
			return this.completeQuest(
				table,
				world,
				questers,
				`${joinNames(questers.map(utag))} have blessed the realm by completing their quest! 25% of their burden is eliminated.`,
				TIME_QUEST_REST_MS
			);
		}
		const target = currentWaypoint(quest);
		if (!questers.every((p) => p.x === target.x && p.y === target.y)) return [];
		if (quest.stage === 0) {
			quest.stage = 1;
			const next = currentWaypoint(quest);
			return [toAll(`${joinNames(questers.map(utag))} reached [${target.x},${target.y}] and set out for [${next.x},${next.y}].`)];
		}
		return this.completeQuest(
			table,
			world,
			questers,
			`${joinNames(questers.map(utag))} have completed their journey! 25% of their burden is eliminated.`,
			GRID_QUEST_REST_MS
		);
	}

	startQuest(table: PlayerTable, world: WorldState): Broadcast[] {
		const now = table.now;
		const random = table.random;
		const eligible = table
			.online()
			.filter((p) => p.level >= QUEST_MIN_LEVEL && now - p.session.since >= QUEST_MIN_ONLINE_MS);
		if (eligible.length < QUEST_SIZE) return [];
		const template = random.pick(this.content.quests);
		if (!template) return [];
		const questers = random.sample(eligible, QUEST_SIZE);
		const names = joinNames(questers.map(utag));
		const ids = questers.map((p) => p.id);

		let quest: ActiveQuest;
		let message: string;
		if (template.kind === "time") {
			const duration = random.int(12 * 3600, 24 * 3600);
			quest = { status: "active", kind: "time", text: template.text, questers: ids, startedAt: now, endsAt: now + duration * 1000 };
			message = `${names} have been chosen by the gods to ${template.text}. Quest to end in ${fmtTime(duration)}.`;
		} else {
			const point = (): Point => ({
				x: random.int(0, this.options.mapWidth - 1),
				y: random.int(0, this.options.mapHeight - 1),
			});
			const waypoints: [Point, Point] = [point(), point()];
			quest = { status: "active", kind: "grid", text: template.text, questers: ids, startedAt: now, waypoints, stage: 0 };
			message = `${names} have been chosen by the gods to ${template.text}. Participants must first reach [${waypoints[0].x},${waypoints[0].y}], then [${waypoints[1].x},${waypoints[1].y}].`;
		}
		world.quest = quest;
		table.logEvent(EVENT_KIND.QUEST, message);
		return [toAll(message)];
	}

	/**
	 * A quester misbehaved: the quest is abandoned and every online player
	 * pays the quest penalty. Does nothing if `player` is not questing.
	 */
	failQuest(table: PlayerTable, world: WorldState, player: Player): Broadcast[] {
		if (!isQuester(world, player.id)) return [];
		world.quest = { status: "idle", nextAt: table.now + QUEST_FAIL_DELAY_MS };
		for (const p of table.online()) {
			table.addPenalty(p, PENALTY_KIND.QUEST, penaltyFor(PENALTY_KIND.QUEST, p.level, { limitPen: this.options.limitPen }));
		}
		const message = `${utag(player)}'s insolence has brought the wrath of the gods down upon the realm. Hell rains down upon you all.`;
		table.logEvent(EVENT_KIND.QUEST, message, player.id);
		return [toAll(message)];
	}

	private completeQuest(
		table: PlayerTable,
		world: WorldState,
		questers: Player[],
		message: string,
		restMs: number
	): Broadcast[] {
		for (const player of questers) player.ttl = Math.floor(player.ttl * 0.75);
		world.quest = { status: "idle", nextAt: table.now + restMs };
		table.logEvent(EVENT_KIND.QUEST, message);
		return [toAll(message)];
	}
}

/** Human-readable description of the world's quest. */
export function describeQuest(quest: QuestState, names: string[], now: number): string {
	if (quest.status === "idle") return "There is no active quest.";
	const who = joinNames(names);
	if (quest.kind === "time") {
		return `${who} are on a quest to ${quest.text}. Quest to complete in ${fmtTime((quest.endsAt - now) / 1000)}.`;
	}
	const [first, second] = quest.waypoints;
	const target = currentWaypoint(quest);
	return `${who} are on a quest to ${quest.text}. Participants must first reach [${first.x},${first.y}], then [${second.x},${second.y}]. Currently heading to [${target.x},${target.y}].`;
}
