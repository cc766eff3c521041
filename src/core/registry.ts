import type { MapNode } from './node/types.js';
import type { Directive } from './directives/types.js';
import { DirectiveRegistrationError, DuplicateDirectiveError, ValidationError } from './errors.js';
import { validateDirectiveName } from './validation-utils.js';
import { refDirective } from './directives/ref.js';
import { useDirective } from './directives/use.js';
import { mergeDirective } from './directives/merge.js';

/**
 * Table of directives keyed by name.
 *
 * Registration happens up front; an `Evaluator` seals the registry it is
 * given, after which evaluation only reads from it.
 */
export class DirectiveRegistry {
    private directives = new Map<string, Directive>();
    private sealed = false;

    register(directive: Directive): this {
        if (this.sealed) {
            throw new DirectiveRegistrationError(`cannot register ${directive.name}: registry is sealed`);
        }

        const check = validateDirectiveName(directive.name);
        if (!check.isValid) {
            throw new DirectiveRegistrationError(check.message ?? `invalid directive name '${directive.name}'`);
        }
        if (typeof directive.handle !== 'function') {
            throw new DirectiveRegistrationError(`directive ${directive.name}: handler cannot be empty`);
        }
        if (this.directives.has(directive.name)) {
            throw new DuplicateDirectiveError(directive.name);
        }

        this.directives.set(directive.name, directive);
        return this;
    }

    get(name: string): Directive | undefined {
        return this.directives.get(name);
    }

    has(name: string): boolean {
        return this.directives.has(name);
    }

    names(): string[] {
        return Array.from(this.directives.keys());
    }

    seal(): this {
        this.sealed = true;
        return this;
    }

    get isSealed(): boolean {
        return this.sealed;
    }

    /**
     * Returns the directive a mapping carries, if any. A mapping may carry at
     * most one.
     */
    findDirective(map: MapNode): Directive | undefined {
        const found: Directive[] = [];
        for (const key of map.entries.keys()) {
            const directive = this.directives.get(key);
            if (directive) found.push(directive);
        }

        if (found.length > 1) {
            throw new ValidationError(`multiple directives are not allowed in a map: ${found.map(d => d.name).join(', ')}`);
        }
        return found[0];
    }
}

/** A fresh registry holding `$ref`, `$use` and `$merge`. */
export function createDefaultRegistry(): DirectiveRegistry {
    return new DirectiveRegistry()
        .register(refDirective)
        .register(useDirective)
        .register(mergeDirective);
}
