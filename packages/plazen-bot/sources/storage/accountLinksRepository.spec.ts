import { describe, expect, it } from "vitest";

import { RelayError } from "../engine/relayError.js";
import { AccountLinksRepository } from "./accountLinksRepository.js";
import { jsonResponse, storageTestFetch } from "./storageTestFetch.js";
import { supabaseClientCreate } from "./supabaseClientCreate.js";

const supabase = { url: "https://example.supabase.co", serviceKey: "test-service-key" };

function repositoryCreate(respond: Parameters<typeof storageTestFetch>[0]) {
    const fake = storageTestFetch(respond);
    const repository = new AccountLinksRepository(supabaseClientCreate(supabase, { fetch: fake.fetch }));
    return { repository, requests: fake.requests };
}

describe("AccountLinksRepository", () => {
    it("filters UserSettings by telegram id with the service key", async () => {
        const { repository, requests } = repositoryCreate(() =>
            jsonResponse([{ user_id: "user-1", telegram_id: "4242", notifications: false }])
        );

        const links = await repository.findByChatId("4242");

        expect(links).toEqual([{ accountId: "user-1", chatId: "4242", notifications: false }]);
        expect(requests).toHaveLength(1);
        const request = requests[0];
        expect(request?.method).toBe("GET");
        expect(request?.url.pathname).toBe("/rest/v1/UserSettings");
        expect(request?.url.searchParams.get("telegram_id")).toBe("eq.4242");
        expect(request?.url.searchParams.get("select")).toBe("user_id,telegram_id,notifications");
        expect(request?.headers.get("apikey")).toBe("test-service-key");
        expect(request?.headers.get("authorization")).toBe("Bearer test-service-key");
    });

    it("returns an empty list when nothing is linked", async () => {
        const { repository } = repositoryCreate(() => jsonResponse([]));

        await expect(repository.findByChatId("4242")).resolves.toEqual([]);
    });

    it("drops rows without an account id", async () => {
        const { repository } = repositoryCreate(() =>
            jsonResponse([{ telegram_id: "4242" }, { user_id: "user-2", telegram_id: "4242" }])
        );

        await expect(repository.findByChatId("4242")).resolves.toEqual([
            { accountId: "user-2", chatId: "4242", notifications: false }
        ]);
    });

    it("asks for accounts with notifications enabled", async () => {
        const { repository, requests } = repositoryCreate(() =>
            jsonResponse([{ user_id: "user-1", telegram_id: 99, notifications: true }])
        );

        const targets = await repository.findReminderTargets();

        expect(targets).toEqual([{ accountId: "user-1", chatId: "99", notifications: true }]);
        expect(requests[0]?.url.searchParams.get("notifications")).toBe("eq.true");
    });

    it("reports backend errors as backend_unavailable", async () => {
        const { repository } = repositoryCreate(() =>
            jsonResponse({ message: "permission denied for table UserSettings", code: "42501" }, 401)
        );

        const failure = repository.findByChatId("4242");

        await expect(failure).rejects.toBeInstanceOf(RelayError);
        await expect(failure).rejects.toMatchObject({
            kind: "backend_unavailable",
            message: "Account link lookup failed: permission denied for table UserSettings (42501)"
        });
    });

    it("reports transport failures as backend_unavailable", async () => {
        const { repository } = repositoryCreate(() => {
            throw new TypeError("fetch failed");
        });

        await expect(repository.findByChatId("4242")).rejects.toMatchObject({ kind: "backend_unavailable" });
    });
});
