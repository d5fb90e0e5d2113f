import {DbDiscountRequirement, DiscountRequirement} from "../../model/DiscountRequirement";
import {DiscountRequirementStore} from "./DiscountRequirementStore";
import {getKnexRead, getKnexWrite} from "../../utils/dbUtils/connection";

export class KnexDiscountRequirementStore implements DiscountRequirementStore {

    async getAllDiscountRequirements(): Promise<DiscountRequirement[]> {
        const knex = await getKnexRead();
        const res: DbDiscountRequirement[] = await knex("DiscountRequirements")
            .select()
            .orderBy("id");
        return res.map(DbDiscountRequirement.toDiscountRequirement);
    }

    async getDiscountRequirementById(id: number): Promise<DiscountRequirement | null> {
        const knex = await getKnexRead();
        const res: DbDiscountRequirement[] = await knex("DiscountRequirements")
            .select()
            .where({
                id: id
            });
        if (res.length === 0) {
            return null;
        }
        if (res.length > 1) {
            throw new Error(`Illegal SELECT query.  Returned ${res.length} values.`);
        }
        return DbDiscountRequirement.toDiscountRequirement(res[0]);
    }

    async insertDiscountRequirement(requirement: Omit<DiscountRequirement, "id">): Promise<DiscountRequirement> {
        const knex = await getKnexWrite();
        const [id]: number[] = await knex("DiscountRequirements")
            .insert(DiscountRequirement.toDbDiscountRequirement(requirement));
        return {
            ...requirement,
            id
        };
    }

    async deleteDiscountRequirement(requirement: DiscountRequirement): Promise<void> {
        const knex = await getKnexWrite();
        const res: number = await knex("DiscountRequirements")
            .where({
                id: requirement.id
            })
            .delete();
        if (res > 1) {
            throw new Error(`Illegal DELETE query.  Deleted ${res} values.`);
        }
    }
}
