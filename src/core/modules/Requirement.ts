// src/core/modules/Requirement.ts

import semver from 'semver';

const NAME_REGEX = /^(@[a-z0-9][\w.-]*\/)?[a-z0-9][\w.-]*/i;

/**
 * A dependency declared by a module, e.g. `left-pad>=1.3` or `@scope/pkg@^2`.
 * `raw` keeps the declared text.
 */
export class Requirement {
    private constructor(
        public readonly name: string,
        public readonly range: string,
        public readonly raw: string,
    ) { }

    /**
     * @throws {Error} when the name or version range cannot be parsed
     */
    public static parse(spec: string): Requirement {
        const raw = spec.trim();
        const match = NAME_REGEX.exec(raw);
        if (!match) {
            throw new Error(`'${spec}' does not start with a package name`);
        }
        const name = match[0];
        let constraint = raw.slice(name.length).trim();
        if (constraint.startsWith('@')) constraint = constraint.slice(1).trim();

        // Comma-separated comparators and == are accepted alongside npm range syntax
        const normalized = constraint.replace(/==/g, '=').replace(/\s*,\s*/g, ' ') || '*';
        const range = semver.validRange(normalized);
        if (range === null) {
            throw new Error(`'${constraint}' is not a valid version range for ${name}`);
        }
        return new Requirement(name, range, raw);
    }

    public satisfiedBy(version: string | null): boolean {
        if (version === null || semver.valid(version) === null) return false;
        return semver.satisfies(version, this.range);
    }

    /**
     * The argument handed to the package installer.
     */
    public toInstallSpec(): string {
        return this.range === '*' ? this.name : `${this.name}@${this.range}`;
    }

    public toString(): string {
        return this.raw;
    }
}
