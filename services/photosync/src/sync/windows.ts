import { EPOCH } from "./state.js";
import type { ExplicitRange, TimeExtremes, TimeWindow } from "./types.js";

export interface WindowPlanInput {
	explicitRange?: ExplicitRange;
	useWindowHeuristic: boolean;
	/** Required when the heuristic applies */
	extremes?: TimeExtremes;
	now: Date;
}

export function hasExplicitRange(range?: ExplicitRange): range is ExplicitRange {
	return Boolean(range && (range.start || range.end));
}

function closed(start: Date, end: Date): TimeWindow {
	return { start, end, includeStart: true, includeEnd: true };
}

/**
 * Decide which time windows of remote metadata to list.
 *
 * The heuristic only looks before the oldest and after the newest known
 * item. Items whose creation time falls strictly between the two are not
 * discovered this way; a full listing (no heuristic) picks them up.
 */
export function planWindows(input: WindowPlanInput): TimeWindow[] {
	const { explicitRange, useWindowHeuristic, extremes, now } = input;

	if (hasExplicitRange(explicitRange)) {
		return [closed(explicitRange.start ?? EPOCH, explicitRange.end ?? now)];
	}

	if (!useWindowHeuristic) {
		return [closed(EPOCH, now)];
	}

	if (!extremes) {
		throw new Error("Window heuristic requires the known time extremes");
	}

	// Empty store: newest is still the epoch sentinel
	if (extremes.newest.getTime() === EPOCH.getTime()) {
		return [closed(EPOCH, now)];
	}

	return [
		{ start: EPOCH, end: extremes.oldest, includeStart: true, includeEnd: false },
		{ start: extremes.newest, end: now, includeStart: false, includeEnd: true },
	];
}

export function formatWindow(window: TimeWindow): string {
	const open = window.includeStart ? "[" : "(";
	const close = window.includeEnd ? "]" : ")";
	return `${open}${window.start.toISOString()}, ${window.end.toISOString()}${close}`;
}
