export class ArgumentNullError extends Error {

    readonly isArgumentNullError = true;
    readonly paramName: string;

    constructor(paramName: string) {
        super(`Value cannot be null.  Parameter name: ${paramName}`);
        this.paramName = paramName;
    }
}
