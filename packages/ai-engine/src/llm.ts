export type LanguageModelKind = 'ollama' | 'disabled';

export type CompletionOptions = Readonly<{
  signal?: AbortSignal;
}>;

/**
 * Single-turn text completion. Implementations reject on transport failures,
 * timeouts and unusable responses; callers decide how to degrade.
 */
export interface LanguageModelClient {
  readonly kind: LanguageModelKind;
  readonly model: string;
  isAvailable(): boolean;
  complete(prompt: string, options?: CompletionOptions): Promise<string>;
}

export class LanguageModelUnavailableError extends Error {
  public override readonly name = 'LanguageModelUnavailableError';

  constructor(message = 'Language model is disabled / not configured') {
    super(message);
    Object.setPrototypeOf(this, LanguageModelUnavailableError.prototype);
  }
}

export class LanguageModelResponseError extends Error {
  public override readonly name = 'LanguageModelResponseError';
  public readonly status: number | undefined;

  constructor(message: string, status?: number) {
    super(message);
    Object.setPrototypeOf(this, LanguageModelResponseError.prototype);
    this.status = status;
  }
}

export class DisabledLanguageModelClient implements LanguageModelClient {
  public readonly kind = 'disabled' as const;
  public readonly model = 'none';

  public isAvailable(): boolean {
    return false;
  }

  public complete(_prompt: string): Promise<string> {
    return Promise.reject(new LanguageModelUnavailableError());
  }
}
