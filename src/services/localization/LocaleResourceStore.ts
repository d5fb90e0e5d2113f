export interface LocaleResourceStore {

    addOrUpdateLocaleResource(resourceName: string, resourceValue: string): Promise<void>;

    /**
     * Delete the resource.  Deleting a resource that doesn't exist is not an error.
     */
    deleteLocaleResource(resourceName: string): Promise<void>;

}
