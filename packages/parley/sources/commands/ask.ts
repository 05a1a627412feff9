import { promises as fs } from "node:fs";
import path from "node:path";

import type { ImagePayload } from "@/types";
import { configLoad } from "../config/configLoad.js";
import { exchangeCreate } from "../exchange/exchangeCreate.js";
import { imageMimeSniff } from "../images/imageMimeSniff.js";
import { getLogger } from "../log.js";
import { profileLoad } from "../profiles/profileLoad.js";
import { DEFAULT_SETTINGS_PATH } from "../settings.js";

export type AskOptions = {
    settings?: string;
    model?: string;
    image?: string[];
    profile?: string;
    output?: string;
};

const CLI_CHAT_ID = "cli";

const logger = getLogger("command.ask");

/**
 * CLI command running a single exchange and printing the reply.
 * Generated images are written next to the output path.
 */
export async function askCommand(text: string, options: AskOptions): Promise<void> {
    const settingsPath = path.resolve(options.settings ?? DEFAULT_SETTINGS_PATH);
    const config = await configLoad(settingsPath, options.model ? { defaultModel: options.model } : {});
    const { exchange, store } = await exchangeCreate(config);

    await exchange.open(CLI_CHAT_ID);
    if (options.profile) {
        const profile = await profileLoad(config.settings.profilesDir, options.profile);
        store.applyProfile(CLI_CHAT_ID, profile);
        console.log(profile.greeting);
    }

    const images = await Promise.all((options.image ?? []).map(imageRead));
    const result = await exchange.send(CLI_CHAT_ID, { text, images });

    if (result.text) {
        console.log(result.text);
    }

    const outputDir = path.resolve(options.output ?? process.cwd());
    for (const [index, image] of result.images.entries()) {
        const target = path.join(outputDir, `parley-${result.exchangeId}-${index + 1}.${imageExtension(image.mimeType)}`);
        await fs.writeFile(target, image.data);
        console.log(`Saved image: ${target}`);
    }

    logger.debug(`event: Ask completed exchangeId=${result.exchangeId} tokens=${result.usage}`);
    if (result.error) {
        process.exitCode = 1;
    }
}

async function imageRead(imagePath: string): Promise<ImagePayload> {
    const data = await fs.readFile(path.resolve(imagePath));
    const mimeType = imageMimeSniff(data);
    if (!mimeType) {
        throw new Error(`Not a supported image: ${imagePath}`);
    }
    return { data, mimeType };
}

function imageExtension(mimeType: string): string {
    const subtype = mimeType.split("/")[1] ?? "bin";
    return subtype === "jpeg" ? "jpg" : subtype;
}
