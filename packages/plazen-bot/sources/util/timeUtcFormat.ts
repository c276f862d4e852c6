/**
 * Formats the UTC wall-clock time of a date as zero-padded HH:MM.
 */
export function timeUtcFormat(date: Date): string {
    return `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}`;
}

function pad(value: number): string {
    return String(value).padStart(2, "0");
}
