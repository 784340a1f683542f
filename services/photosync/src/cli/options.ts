import { InvalidArgumentError } from "commander";

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Parse a --from/--to value. A bare YYYY-MM-DD is taken as a UTC day:
 * the start of the day for --from, the end of it for --to.
 */
export function parseDateOption(value: string, endOfDay = false): Date {
	const trimmed = value.trim();
	const iso = DATE_ONLY.test(trimmed)
		? `${trimmed}T${endOfDay ? "23:59:59.999" : "00:00:00.000"}Z`
		: trimmed;

	const date = new Date(iso);
	if (Number.isNaN(date.getTime())) {
		throw new InvalidArgumentError(`Not a valid date: ${value}`);
	}
	return date;
}

export function parsePositiveInt(value: string): number {
	const parsed = Number(value);
	if (!Number.isInteger(parsed) || parsed < 1) {
		throw new InvalidArgumentError(`Expected a positive integer, got ${value}`);
	}
	return parsed;
}
