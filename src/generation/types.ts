// ===========================================================================
// Generation types
//
// What the prompt pipeline needs from a code generator, plus the
// abstractions over the VS Code Language Model API the default generator is
// built on. Nothing here imports `vscode`.
// ===========================================================================

/** Editor context sent along with every generation request. */
export interface GenerationContext {
  /** Language id of the target document. */
  readonly language: string;
  readonly filePath: string;
  readonly fileContent: string;
}

/**
 * One implementation per vendor. The prompt pipeline never branches on which
 * provider served a request.
 */
export interface IGenerationProvider {
  readonly id: string;
  /** Resolves with the raw response text; rejects with a GenerationError. */
  generate(prompt: string, context: GenerationContext, token: ICancellationToken): Promise<string>;
  /** Whether the provider can currently serve requests. */
  validate(): Promise<boolean>;
}

// ===========================================================================
// Dependency inversion interfaces over VS Code APIs
// ===========================================================================

/** Abstraction over vscode.lm.selectChatModels */
export interface ILanguageModelProvider {
  selectModels(selector: {
    vendor: string;
    family?: string;
  }): Promise<ILanguageModel[]>;
}

/** Abstraction over a vscode.LanguageModelChat instance */
export interface ILanguageModel {
  readonly id: string;
  readonly vendor: string;
  readonly family: string;
  readonly name: string;
  readonly maxInputTokens: number;
  sendRequest(
    messages: readonly ILanguageModelMessage[],
    options: Record<string, unknown>,
    token: ICancellationToken
  ): Promise<ILanguageModelResponse>;
}

/** Abstraction over LanguageModelChatMessage */
export interface ILanguageModelMessage {
  readonly role: "user" | "assistant";
  readonly content: string;
}

/** Abstraction over the response from sendRequest */
export interface ILanguageModelResponse {
  readonly text: AsyncIterable<string>;
}

/** Abstraction over CancellationToken */
export interface ICancellationToken {
  readonly isCancellationRequested: boolean;
  onCancellationRequested(listener: () => void): { dispose(): void };
}

/** Abstraction over CancellationTokenSource */
export interface ICancellationTokenSource {
  readonly token: ICancellationToken;
  cancel(): void;
  dispose(): void;
}

/** Factory for creating ICancellationTokenSource instances */
export interface ICancellationTokenSourceFactory {
  create(): ICancellationTokenSource;
}
