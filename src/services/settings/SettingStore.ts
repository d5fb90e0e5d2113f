export interface SettingStore {

    /**
     * Get the value of the setting with the given key, or null if it isn't set.
     */
    getSettingByKey(key: string): Promise<string | null>;

    setSetting(key: string, value: string): Promise<void>;

}
