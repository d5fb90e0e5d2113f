import {DiscountRequirement} from "../../model/DiscountRequirement";
import {DiscountRequirementStore} from "./DiscountRequirementStore";

export class MockDiscountRequirementStore implements DiscountRequirementStore {

    requirements: DiscountRequirement[] = [];
    private nextId = 1;

    async getAllDiscountRequirements(): Promise<DiscountRequirement[]> {
        return this.requirements.map(r => ({...r}));
    }

    async getDiscountRequirementById(id: number): Promise<DiscountRequirement | null> {
        const requirement = this.requirements.find(r => r.id === id);
        return requirement ? {...requirement} : null;
    }

    async insertDiscountRequirement(requirement: Omit<DiscountRequirement, "id">): Promise<DiscountRequirement> {
        const inserted: DiscountRequirement = {...requirement, id: this.nextId++};
        this.requirements.push(inserted);
        return {...inserted};
    }

    async deleteDiscountRequirement(requirement: DiscountRequirement): Promise<void> {
        this.requirements = this.requirements.filter(r => r.id !== requirement.id);
    }
}
