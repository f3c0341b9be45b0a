/**
 * Trimmed env var value, or `fallback` when it is unset or blank.
 */
export function parseEnvString(
    value: string | undefined,
    fallback: string
): string {
    const trimmed = value?.trim();
    return trimmed ? trimmed : fallback;
}
