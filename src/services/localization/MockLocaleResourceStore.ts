import {LocaleResourceStore} from "./LocaleResourceStore";

export class MockLocaleResourceStore implements LocaleResourceStore {

    resources = new Map<string, string>();

    async addOrUpdateLocaleResource(resourceName: string, resourceValue: string): Promise<void> {
        this.resources.set(resourceName, resourceValue);
    }

    async deleteLocaleResource(resourceName: string): Promise<void> {
        this.resources.delete(resourceName);
    }
}
