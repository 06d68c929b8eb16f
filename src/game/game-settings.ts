import { reactive, watch } from 'vue';
import { LogHandler } from '@/utilities/log-handler';
import { MemorySettingsStorage, type SettingsStorage } from '@/utilities/settings-storage';

const SETTINGS_STORAGE_KEY = 'twin_halves_settings';

/** Debounce delay for persisting changed settings (ms) */
const SAVE_DELAY_MS = 100;

/**
 * Game settings schema - add new settings here and they will be automatically
 * persisted and restored on start.
 */
export interface GameSettings {
    // Presentation
    /** Distance between cell centres in anchored units */
    cellSpacing: number;

    // Session
    /** Reject moves until the presentation reports the last move animation finished */
    lockInputWhileAnimating: boolean;
    /** Catalog index of the first level; wraps modulo the catalog size */
    startLevelIndex: number;
    /** Accept the skip-level command */
    allowDebugAdvance: boolean;
}

/** Default values for all settings */
const DEFAULT_SETTINGS: GameSettings = {
    cellSpacing: 150,
    lockInputWhileAnimating: true,
    startLevelIndex: 0,
    allowDebugAdvance: true,
};

const log = new LogHandler('GameSettings');

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Copy stored values over the defaults, keeping only keys whose type matches */
function mergeSettings(stored: Record<string, unknown>): GameSettings {
    const merged: GameSettings = { ...DEFAULT_SETTINGS };

    if (typeof stored.cellSpacing === 'number' && stored.cellSpacing > 0) {
        merged.cellSpacing = stored.cellSpacing;
    }
    if (typeof stored.lockInputWhileAnimating === 'boolean') {
        merged.lockInputWhileAnimating = stored.lockInputWhileAnimating;
    }
    if (typeof stored.startLevelIndex === 'number' && Number.isInteger(stored.startLevelIndex)) {
        merged.startLevelIndex = stored.startLevelIndex;
    }
    if (typeof stored.allowDebugAdvance === 'boolean') {
        merged.allowDebugAdvance = stored.allowDebugAdvance;
    }

    return merged;
}

/** Load settings from storage, merging with defaults */
function loadSettings(storage: SettingsStorage): GameSettings {
    try {
        const stored = storage.getItem(SETTINGS_STORAGE_KEY);
        if (!stored) return { ...DEFAULT_SETTINGS };

        const parsed: unknown = JSON.parse(stored);
        if (!isRecord(parsed)) {
            log.warn('Stored settings are not an object, using defaults');
            return { ...DEFAULT_SETTINGS };
        }
        return mergeSettings(parsed);
    } catch (e) {
        log.error('Failed to load game settings, using defaults', e);
        return { ...DEFAULT_SETTINGS };
    }
}

/** Save settings to storage */
function saveSettings(storage: SettingsStorage, settings: GameSettings): void {
    try {
        storage.setItem(SETTINGS_STORAGE_KEY, JSON.stringify(settings));
    } catch (e) {
        log.error('Failed to save game settings', e);
    }
}

/**
 * Centralized game settings manager.
 * - Loads settings from its storage on init
 * - Saves settings (debounced) when any value changes
 * - Exposes reactive state so presenters can watch it
 */
export class GameSettingsManager {
    public readonly state: GameSettings;

    private saveTimeoutId: ReturnType<typeof setTimeout> | null = null;

    constructor(private storage: SettingsStorage = new MemorySettingsStorage()) {
        this.state = reactive<GameSettings>(loadSettings(storage));
        this.setupAutoSave();
    }

    /** Switch to another storage and reload from it */
    public useStorage(storage: SettingsStorage): void {
        this.cancelPendingSave();
        this.storage = storage;
        Object.assign(this.state, loadSettings(storage));
        this.cancelPendingSave();
    }

    /** Write pending changes now instead of waiting for the debounce */
    public flush(): void {
        if (this.saveTimeoutId === null) return;
        this.cancelPendingSave();
        saveSettings(this.storage, this.state);
    }

    /** Reset all settings to defaults */
    public resetToDefaults(): void {
        Object.assign(this.state, DEFAULT_SETTINGS);
    }

    /** Get a copy of the default settings */
    public getDefaults(): GameSettings {
        return { ...DEFAULT_SETTINGS };
    }

    /** Watch every settings key and persist on change */
    private setupAutoSave(): void {
        const settingsKeys = Object.keys(DEFAULT_SETTINGS) as (keyof GameSettings)[];

        for (const key of settingsKeys) {
            watch(
                () => this.state[key],
                () => this.debouncedSave(),
                { flush: 'sync' }
            );
        }
    }

    private debouncedSave(): void {
        this.cancelPendingSave();
        this.saveTimeoutId = setTimeout(() => {
            this.saveTimeoutId = null;
            saveSettings(this.storage, this.state);
        }, SAVE_DELAY_MS);
    }

    private cancelPendingSave(): void {
        if (this.saveTimeoutId !== null) {
            clearTimeout(this.saveTimeoutId);
            this.saveTimeoutId = null;
        }
    }
}

// Singleton instance
export const gameSettings = new GameSettingsManager();
