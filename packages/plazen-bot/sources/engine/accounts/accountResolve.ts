import { getLogger } from "../../log.js";
import type { AccountLinkStore } from "../../storage/storageTypes.js";
import type { AccountLink, ChatIdentity } from "../../types.js";

const logger = getLogger("accounts.resolve");

export type AccountResolveResult =
    | { type: "linked"; account: AccountLink }
    | { type: "missing" }
    | { type: "conflict"; accountIds: string[] };

/**
 * Maps a chat to the single account linked to it.
 * Several rows naming the same account count as one link; rows naming different accounts are a conflict.
 */
export async function accountResolve(
    accountLinks: AccountLinkStore,
    chatId: ChatIdentity
): Promise<AccountResolveResult> {
    const links = await accountLinks.findByChatId(chatId);
    const first = links[0];
    if (!first) {
        logger.info(`event: No account linked chatId=${chatId}`);
        return { type: "missing" };
    }

    const accountIds = [...new Set(links.map((link) => link.accountId))];
    if (accountIds.length > 1) {
        logger.error({ chatId, accountIds }, "error: Chat id is linked to several accounts");
        return { type: "conflict", accountIds };
    }
    if (links.length > 1) {
        logger.warn({ chatId, rows: links.length }, "event: Duplicate link rows for one account");
    }

    return { type: "linked", account: first };
}
