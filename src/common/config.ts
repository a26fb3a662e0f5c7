import { ConfigService } from "@nestjs/config";

/** Reads a positive number setting, falling back when it is not set. */
export function positiveNumberSetting(
	config: ConfigService,
	key: string,
	fallback: number,
): number {
	const raw = config.get<string | number>(key);
	if (raw === undefined || raw === "") {
		return fallback;
	}
	const value = Number(raw);
	if (!Number.isFinite(value) || value <= 0) {
		throw new Error(`${key} must be a positive number, got '${raw}'`);
	}
	return value;
}

export const HOUR_MS = 60 * 60 * 1000;
