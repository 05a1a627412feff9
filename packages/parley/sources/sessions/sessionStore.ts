import { conversationTrim } from "../conversation/conversationTrim.js";
import { messageBuildSystem } from "../conversation/messageBuild.js";
import { getLogger } from "../log.js";
import type { Profile } from "../profiles/profileTypes.js";
import type { ModelSelector } from "../providers/providerTypes.js";
import {
    DEFAULT_IMAGE_OUTPUT,
    IMAGE_ASPECT_RATIOS,
    IMAGE_MODALITIES,
    IMAGE_SIZES,
    type ImageOutput,
    RESPONSE_FORMATS,
    type ResponseFormat
} from "../settings.js";
import { AsyncLock } from "../util/asyncLock.js";
import type { Session, SessionDefaults, SessionSnapshot } from "./sessionTypes.js";

export type SessionStoreOptions = {
    defaults: SessionDefaults;
    now?: () => number;
};

const logger = getLogger("sessions.store");

/**
 * In-memory sessions keyed by chat id, with one lock per chat.
 * Expects: unknown ids create a default session; nothing here does I/O.
 */
export class SessionStore {
    private readonly defaults: SessionDefaults;
    private readonly now: () => number;
    private sessions = new Map<string, Session>();
    private locks = new Map<string, AsyncLock>();

    constructor(options: SessionStoreOptions) {
        this.defaults = options.defaults;
        this.now = options.now ?? Date.now;
    }

    getOrCreate(chatId: string): { session: Session; created: boolean } {
        const existing = this.sessions.get(chatId);
        if (existing) {
            return { session: existing, created: false };
        }
        const timestamp = this.now();
        const systemPrompt = this.defaults.systemPrompt;
        const session: Session = {
            id: chatId,
            conversation: systemPrompt ? [messageBuildSystem(systemPrompt)] : [],
            model: { ...this.defaults.model },
            tokensUsed: 0,
            maxRounds: this.defaults.maxRounds,
            responseFormat: "auto",
            pluginMetadata: {},
            systemPrompt,
            profileName: null,
            imageOutput: { ...DEFAULT_IMAGE_OUTPUT },
            started: false,
            createdAt: timestamp,
            updatedAt: timestamp
        };
        this.sessions.set(chatId, session);
        logger.debug(`create: Session created chatId=${chatId} model=${session.model.modelId}`);
        return { session, created: true };
    }

    get(chatId: string): Session {
        return this.getOrCreate(chatId).session;
    }

    has(chatId: string): boolean {
        return this.sessions.has(chatId);
    }

    list(): string[] {
        return Array.from(this.sessions.keys());
    }

    /**
     * Marks the session as started. Returns true only for the first call,
     * however the session was created.
     */
    markStarted(chatId: string): boolean {
        const session = this.get(chatId);
        if (session.started) {
            return false;
        }
        session.started = true;
        return true;
    }

    /**
     * Runs work for one chat at a time; different chats proceed concurrently.
     * A chat's lock is dropped once nothing holds or waits for it.
     */
    async inLock<T>(chatId: string, func: () => Promise<T> | T): Promise<T> {
        const lock = this.locks.get(chatId) ?? this.lockCreate(chatId);
        try {
            return await lock.inLock(func);
        } finally {
            if (!lock.isBusy() && this.locks.get(chatId) === lock) {
                this.locks.delete(chatId);
            }
        }
    }

    lockCount(): number {
        return this.locks.size;
    }

    clear(chatId: string): void {
        const session = this.get(chatId);
        session.conversation = session.systemPrompt ? [messageBuildSystem(session.systemPrompt)] : [];
        this.touch(session);
    }

    trim(chatId: string): void {
        const session = this.get(chatId);
        const trimmed = conversationTrim(session.conversation, session.maxRounds);
        if (trimmed !== session.conversation) {
            session.conversation = trimmed;
            this.touch(session);
        }
    }

    setModel(chatId: string, model: ModelSelector): void {
        const session = this.get(chatId);
        session.model = { ...model };
        this.touch(session);
    }

    /** Values below 1 or non-integers fall back to the default round limit. */
    setMaxRounds(chatId: string, maxRounds: number): number {
        const session = this.get(chatId);
        session.maxRounds = Number.isInteger(maxRounds) && maxRounds >= 1 ? maxRounds : this.defaults.maxRounds;
        this.touch(session);
        return session.maxRounds;
    }

    setResponseFormat(chatId: string, format: string): boolean {
        const normalized = RESPONSE_FORMATS.find((entry) => entry === format.trim().toLowerCase());
        if (!normalized) {
            return false;
        }
        const session = this.get(chatId);
        session.responseFormat = normalized;
        this.touch(session);
        return true;
    }

    /**
     * Updates the image output preference. Rejects the whole patch when any
     * field is outside the supported values.
     */
    setImageOutput(chatId: string, patch: Partial<ImageOutput>): boolean {
        if (patch.modalities !== undefined && !IMAGE_MODALITIES.includes(patch.modalities)) {
            return false;
        }
        if (patch.aspectRatio && !IMAGE_ASPECT_RATIOS.includes(patch.aspectRatio)) {
            return false;
        }
        if (patch.imageSize && !IMAGE_SIZES.includes(patch.imageSize)) {
            return false;
        }
        const session = this.get(chatId);
        session.imageOutput = { ...session.imageOutput, ...patch };
        this.touch(session);
        return true;
    }

    /** Replaces the conversation with the profile's system prompt and switches model. */
    applyProfile(chatId: string, profile: Profile): void {
        const session = this.get(chatId);
        session.systemPrompt = profile.systemPrompt;
        session.conversation = [messageBuildSystem(profile.systemPrompt)];
        session.model = { ...profile.model };
        session.profileName = profile.name;
        this.touch(session);
    }

    addTokens(chatId: string, tokens: number): void {
        const session = this.get(chatId);
        session.tokensUsed += tokens;
        this.touch(session);
    }

    deactivate(chatId: string): boolean {
        const removed = this.sessions.delete(chatId);
        if (removed) {
            logger.debug(`remove: Session deactivated chatId=${chatId}`);
        }
        return removed;
    }

    snapshot(chatId: string): SessionSnapshot {
        const session = this.get(chatId);
        const { pluginMetadata: _metadata, ...rest } = session;
        return Object.freeze({
            ...rest,
            model: { ...session.model },
            imageOutput: { ...session.imageOutput },
            conversation: Object.freeze([...session.conversation])
        });
    }

    private lockCreate(chatId: string): AsyncLock {
        const lock = new AsyncLock();
        this.locks.set(chatId, lock);
        return lock;
    }

    private touch(session: Session): void {
        session.updatedAt = this.now();
    }
}
