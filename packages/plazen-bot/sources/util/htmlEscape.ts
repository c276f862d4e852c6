/**
 * Escapes text for Telegram's HTML parse mode, which only reserves &, < and >.
 */
export function htmlEscape(value: string): string {
    return value.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}
