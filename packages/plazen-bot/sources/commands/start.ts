import { configLoad } from "../config/configLoad.js";
import { COMMAND_LIST } from "../engine/commands/commandList.js";
import { Engine } from "../engine/engine.js";
import { getLogger } from "../log.js";
import { TelegramConnector } from "../plugins/telegram/connector.js";
import { storageCreate } from "../storage/storage.js";
import { supabaseClientCreate } from "../storage/supabaseClientCreate.js";
import { awaitShutdown, onShutdown } from "../util/shutdown.js";

const logger = getLogger("command.start");

export async function startCommand(): Promise<void> {
    const config = configLoad();
    logger.info(`start: Starting Plazen bot reminders=${config.reminders.enabled}`);

    const storage = storageCreate(supabaseClientCreate(config.supabase));
    const connector = new TelegramConnector({ token: config.telegram.token, commands: COMMAND_LIST });
    const engine = new Engine({ reminders: config.reminders, connector, storage });

    onShutdown("engine", () => engine.shutdown());
    engine.start();

    const reason = await awaitShutdown();
    logger.info(`event: Plazen bot stopped reason=${reason}`);
}
