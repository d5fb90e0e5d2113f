import {DiscountRequirement} from "../../model/DiscountRequirement";

export interface DiscountRequirementStore {

    getAllDiscountRequirements(): Promise<DiscountRequirement[]>;

    getDiscountRequirementById(id: number): Promise<DiscountRequirement | null>;

    insertDiscountRequirement(requirement: Omit<DiscountRequirement, "id">): Promise<DiscountRequirement>;

    /**
     * Delete the requirement.  Deleting a requirement that no longer exists is not an error.
     */
    deleteDiscountRequirement(requirement: DiscountRequirement): Promise<void>;

}
