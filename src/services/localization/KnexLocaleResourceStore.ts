import {LocaleResourceStore} from "./LocaleResourceStore";
import {getKnexWrite} from "../../utils/dbUtils/connection";

interface DbLocaleStringResource {
    resourceName: string;
    resourceValue: string;
}

export class KnexLocaleResourceStore implements LocaleResourceStore {

    async addOrUpdateLocaleResource(resourceName: string, resourceValue: string): Promise<void> {
        const knex = await getKnexWrite();
        const resource: DbLocaleStringResource = {
            resourceName,
            resourceValue
        };
        await knex("LocaleStringResources")
            .insert(resource)
            .onConflict("resourceName")
            .merge();
    }

    async deleteLocaleResource(resourceName: string): Promise<void> {
        const knex = await getKnexWrite();
        await knex("LocaleStringResources")
            .where({
                resourceName
            })
            .delete();
    }
}
