import { DumperError, NameConflictError } from './errors';

export interface UniqueNameRequest {
    /** Name must be granted verbatim (a module port). Only names passed to the constructor qualify. */
    reserved?: boolean;
}

/**
 * Hands out collision-free names within one scope.
 *
 * Reserved names are claimed when the uniquifier is created, so a port always
 * keeps its name even if an internal signal declared before it asks for the
 * same one. Other names get the first free `_<n>` suffix.
 */
export class NameUniquifier {
    private readonly scope: string;
    private readonly reservedNames: Set<string> = new Set();
    private readonly grantedReserved: Set<string> = new Set();
    private readonly takenNames: Set<string> = new Set();

    constructor(scope: string, reservedNames: Iterable<string> = []) {
        this.scope = scope;
        for (const name of reservedNames) {
            if (this.reservedNames.has(name)) {
                throw new NameConflictError(scope, name);
            }
            this.reservedNames.add(name);
        }
    }

    getUniqueName(initialName: string, request: UniqueNameRequest = {}): string {
        if (request.reserved) {
            return this.claimReserved(initialName);
        }

        let candidate = initialName;
        let suffix = 0;
        while (this.isUnavailable(candidate)) {
            candidate = `${initialName}_${suffix++}`;
        }
        this.takenNames.add(candidate);
        return candidate;
    }

    isAvailable(name: string): boolean {
        return !this.isUnavailable(name);
    }

    private claimReserved(name: string): string {
        if (!this.reservedNames.has(name)) {
            throw new DumperError(`Name "${name}" was not reserved in scope "${this.scope}"`);
        }
        if (this.grantedReserved.has(name)) {
            throw new NameConflictError(this.scope, name);
        }
        this.grantedReserved.add(name);
        this.takenNames.add(name);
        return name;
    }

    private isUnavailable(name: string): boolean {
        return this.takenNames.has(name) || this.reservedNames.has(name);
    }
}
