import {SettingStore} from "./SettingStore";
import {getKnexRead, getKnexWrite} from "../../utils/dbUtils/connection";

interface DbSetting {
    name: string;
    value: string;
}

export class KnexSettingStore implements SettingStore {

    async getSettingByKey(key: string): Promise<string | null> {
        const knex = await getKnexRead();
        const res: DbSetting[] = await knex("Settings")
            .select()
            .where({
                name: key
            });
        if (res.length === 0) {
            return null;
        }
        if (res.length > 1) {
            throw new Error(`Illegal SELECT query.  Returned ${res.length} values.`);
        }
        return res[0].value;
    }

    async setSetting(key: string, value: string): Promise<void> {
        const knex = await getKnexWrite();
        const setting: DbSetting = {
            name: key,
            value: value
        };
        await knex("Settings")
            .insert(setting)
            .onConflict("name")
            .merge();
    }
}
