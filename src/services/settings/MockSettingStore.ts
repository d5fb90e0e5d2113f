import {SettingStore} from "./SettingStore";

export class MockSettingStore implements SettingStore {

    settings = new Map<string, string>();

    async getSettingByKey(key: string): Promise<string | null> {
        return this.settings.get(key) ?? null;
    }

    async setSetting(key: string, value: string): Promise<void> {
        this.settings.set(key, value);
    }
}
