import * as fs from 'fs';
import * as path from 'path';

/** The subset of the Web Storage API the settings manager needs */
export interface SettingsStorage {
    getItem(key: string): string | null;
    setItem(key: string, value: string): void;
}

export class MemorySettingsStorage implements SettingsStorage {
    private readonly items = new Map<string, string>();

    public getItem(key: string): string | null {
        return this.items.get(key) ?? null;
    }

    public setItem(key: string, value: string): void {
        this.items.set(key, value);
    }
}

/**
 * Stores every key as a property of one JSON file.
 * A missing file reads as empty; read and write errors propagate to the caller.
 */
export class FileSettingsStorage implements SettingsStorage {
    constructor(private readonly filePath: string) {}

    private readAll(): Record<string, string> {
        if (!fs.existsSync(this.filePath)) {
            return {};
        }
        const parsed: unknown = JSON.parse(fs.readFileSync(this.filePath, 'utf8'));
        if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
            throw new Error(`${this.filePath} does not contain a JSON object`);
        }
        const items: Record<string, string> = {};
        for (const [key, value] of Object.entries(parsed)) {
            if (typeof value === 'string') {
                items[key] = value;
            }
        }
        return items;
    }

    public getItem(key: string): string | null {
        return this.readAll()[key] ?? null;
    }

    public setItem(key: string, value: string): void {
        const items = this.readAll();
        items[key] = value;
        fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
        fs.writeFileSync(this.filePath, JSON.stringify(items, null, 2) + '\n', 'utf8');
    }
}
