/**
 * Error taxonomy for the encounter engine
 */

export type ContentKind = 'archetype' | 'pack' | 'party type';

export class NotFoundError extends Error {
    constructor(public readonly kind: ContentKind, public readonly id: string) {
        super(`Unknown ${kind}: "${id}"`);
        this.name = 'NotFoundError';
    }
}

export class DuplicateRegistrationError extends Error {
    constructor(public readonly kind: ContentKind, public readonly id: string) {
        super(`Duplicate ${kind} id: "${id}"`);
        this.name = 'DuplicateRegistrationError';
    }
}

export class RegistrySealedError extends Error {
    constructor(public readonly id: string) {
        super(`Registry is sealed; cannot register "${id}"`);
        this.name = 'RegistrySealedError';
    }
}

/**
 * No archetypes at all. The only condition selection cannot recover from.
 */
export class EmptyRegistryError extends Error {
    constructor(message: string = 'No enemy archetypes are registered') {
        super(message);
        this.name = 'EmptyRegistryError';
    }
}

export interface ContentIssue {
    path: string;
    message: string;
}

export class ContentValidationError extends Error {
    constructor(public readonly source: string, public readonly issues: ContentIssue[]) {
        super(`Invalid content in ${source}: ${issues.map(i => `${i.path || '(root)'}: ${i.message}`).join('; ')}`);
        this.name = 'ContentValidationError';
    }
}
