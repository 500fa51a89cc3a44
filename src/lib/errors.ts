// src/lib/errors.ts
// Errori del motore di derivazione: input non valido e dipendenze esterne mancanti.

export type Dependency = 'ephemeris' | 'houses';

/** Input del chiamante non utilizzabile (data, ora, zona, coordinate, config). */
export class InvalidInputError extends Error {
  readonly field: string | null;

  constructor(message: string, field: string | null = null) {
    super(field ? `${field}: ${message}` : message);
    this.name = 'InvalidInputError';
    this.field = field;
  }
}

/** Un provider esterno ha sollevato un errore o non ha restituito dati. */
export class MissingDependencyError extends Error {
  readonly dependency: Dependency;
  readonly body: string | null;

  constructor(dependency: Dependency, message: string, body: string | null = null) {
    super(body ? `${dependency}/${body}: ${message}` : `${dependency}: ${message}`);
    this.name = 'MissingDependencyError';
    this.dependency = dependency;
    this.body = body;
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
