const ENTITY_MAX_LENGTH = 10;

/**
 * Splits a Telegram message into chunks of at most maxLength characters.
 * Chunks break between lines; a single line longer than maxLength breaks at its last space, or hard.
 * A hard break never lands inside an HTML tag, an entity or a surrogate pair. A tag pair cut by a
 * break is left unbalanced, and Telegram rejects it; the connector then resends the chunk as plain text.
 * Expects: maxLength > 0.
 */
export function telegramMessageSplit(text: string, maxLength: number): string[] {
    if (maxLength <= 0) {
        throw new Error("maxLength must be greater than 0");
    }
    if (text.length <= maxLength) {
        return [text];
    }

    const chunks: string[] = [];
    let current: string | null = null;
    for (const line of text.split("\n")) {
        const pieces = line.length > maxLength ? lineSplit(line, maxLength) : [line];
        for (const piece of pieces) {
            if (current === null) {
                current = piece;
            } else if (current.length + 1 + piece.length <= maxLength) {
                current = `${current}\n${piece}`;
            } else {
                chunks.push(current);
                current = piece;
            }
        }
    }
    if (current !== null) {
        chunks.push(current);
    }
    return chunks.filter((chunk) => chunk.trim().length > 0);
}

function lineSplit(line: string, maxLength: number): string[] {
    const pieces: string[] = [];
    let remaining = line;
    while (remaining.length > maxLength) {
        const window = remaining.slice(0, maxLength);
        const space = window.lastIndexOf(" ");
        if (space > 0) {
            pieces.push(remaining.slice(0, space));
            remaining = remaining.slice(space + 1);
        } else {
            const cut = hardCutIndex(window);
            pieces.push(remaining.slice(0, cut));
            remaining = remaining.slice(cut);
        }
    }
    pieces.push(remaining);
    return pieces;
}

function hardCutIndex(window: string): number {
    let cut = window.length;
    const tagOpen = window.lastIndexOf("<");
    if (tagOpen > window.lastIndexOf(">")) {
        cut = tagOpen;
    }
    const entityOpen = window.lastIndexOf("&", cut - 1);
    if (entityOpen !== -1 && entityOpen > window.lastIndexOf(";", cut - 1) && cut - entityOpen <= ENTITY_MAX_LENGTH) {
        cut = entityOpen;
    }
    const last = window.charCodeAt(cut - 1);
    if (last >= 0xd800 && last <= 0xdbff) {
        cut -= 1;
    }
    return cut > 0 ? cut : window.length;
}
