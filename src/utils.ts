import os from "node:os";
import path from "node:path";

export function sleep(ms: number) {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

export const HOUR_MS = 60 * 60 * 1000;

/**
 * Hours between two instants, rounded to two decimals. Negative once `to` has passed.
 */
export function hoursBetween(from: number, to: number): number {
	return Math.round(((to - from) / HOUR_MS) * 100) / 100;
}

export function toIso(ms: number): string {
	return new Date(ms).toISOString();
}

export const CONFIG_DIR = process.env.VITALSYNC_DATA_DIR || path.join(os.homedir(), ".vitalsync");
