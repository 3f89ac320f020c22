/**
 * Parses a base-10 integer from an env var, using `fallback` when the value is empty.
 */
export function parseEnvInt(value: string | undefined, fallback: number): number {
    const source =
        typeof value === "string" && value.trim().length > 0
            ? value.trim()
            : String(fallback);
    return Number.parseInt(source, 10);
}

export function isEnvFlagEnabled(value: string | undefined): boolean {
    const normalized = value?.trim().toLowerCase();
    return normalized === "true" || normalized === "1" || normalized === "yes";
}

export function parseEnvCsv(value: string | undefined): string[] | undefined {
    if (value === undefined) {
        return undefined;
    }
    return value
        .split(",")
        .map((entry) => entry.trim())
        .filter((entry) => entry.length > 0);
}
