/**
 * Parses an on/off style flag ("1", "true", "yes", "on" and their negatives).
 * Returns null for blank or unrecognized input.
 */
export function booleanFlagParse(value: string | null | undefined): boolean | null {
    if (!value) {
        return null;
    }
    const normalized = value.trim().toLowerCase();
    if (normalized === "1" || normalized === "true" || normalized === "yes" || normalized === "on") {
        return true;
    }
    if (normalized === "0" || normalized === "false" || normalized === "no" || normalized === "off") {
        return false;
    }
    return null;
}
