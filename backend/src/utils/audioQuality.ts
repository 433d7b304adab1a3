import path from "path";
import type { SearchResult } from "../types/slskd";

export const AUDIO_EXTENSIONS: ReadonlySet<string> = new Set([
    "flac",
    "wav",
    "m4a",
    "ogg",
    "aac",
    "wma",
    "mp3",
]);

const FORMAT_WEIGHTS: ReadonlyMap<string, number> = new Map([
    ["flac", 1.0],
    ["wav", 0.85],
    ["m4a", 0.65],
    ["aac", 0.65],
    ["ogg", 0.6],
    ["mp3", 0.55],
    ["wma", 0.4],
]);
const UNKNOWN_FORMAT_WEIGHT = 0.3;

/** Lowercased extension without the dot, "" when there is none */
export function fileExtension(filename: string): string {
    return path.posix.extname(filename.replace(/\\/g, "/")).slice(1).toLowerCase();
}

/** Files without an extension are let through; peers do share those */
export function isAudioFile(filename: string): boolean {
    const ext = fileExtension(filename);
    return ext === "" || AUDIO_EXTENSIONS.has(ext);
}

export function qualityLabel(filename: string): string {
    return fileExtension(filename) || "unknown";
}

/**
 * Format/bitrate/availability score in [0, 1]:
 * - FLAC 1.0, WAV 0.85, M4A/AAC 0.65, OGG 0.6, MP3 0.55, WMA 0.4, other 0.3
 * - bitrate >= 320: +0.2, >= 256: +0.1, < 128: -0.3
 * - free upload slot +0.1, upload speed > 100 +0.05, queue > 10 -0.1
 */
export function qualityScore(file: SearchResult): number {
    let score = FORMAT_WEIGHTS.get(fileExtension(file.filename)) ?? UNKNOWN_FORMAT_WEIGHT;

    if (file.bitrate !== undefined) {
        if (file.bitrate >= 320) score += 0.2;
        else if (file.bitrate >= 256) score += 0.1;
        else if (file.bitrate < 128) score -= 0.3;
    }

    if (file.hasFreeUploadSlot) score += 0.1;
    if (file.uploadSpeed > 100) score += 0.05;
    if (file.queueLength > 10) score -= 0.1;

    return Math.min(1, Math.max(0, score));
}
