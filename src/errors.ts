/**
 * Base error for the engine. Only ConfigurationError and EngineUsageError
 * escape the public API; the others are recovered where they are raised.
 */
export class DeckfitError extends Error {
  public readonly context?: Record<string, unknown>;

  constructor(message: string, context?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DeckfitError";
    this.context = context;
  }
}

/** Invalid style guide, template catalog or keyword table. Fatal at construction. */
export class ConfigurationError extends DeckfitError {
  constructor(message: string, context?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, context, options);
    this.name = "ConfigurationError";
  }
}

/** A slot references content the block does not have and the slot has no default */
export class ContentBindingError extends DeckfitError {
  constructor(
    message: string,
    public readonly templateId: string,
    public readonly slot: string
  ) {
    super(message, { templateId, slot });
    this.name = "ContentBindingError";
  }
}

/** The metrics provider cannot resolve a font family */
export class MetricsUnavailableError extends DeckfitError {
  constructor(public readonly family: string) {
    super(`Font family "${family}" is not available to the metrics provider`, { family });
    this.name = "MetricsUnavailableError";
  }
}

/** Programmer error: null model, unknown box reference, unknown category, bad range */
export class EngineUsageError extends DeckfitError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, context);
    this.name = "EngineUsageError";
  }
}
