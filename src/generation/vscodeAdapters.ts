import * as vscode from "vscode";
import type {
  ICancellationToken,
  ICancellationTokenSource,
  ICancellationTokenSourceFactory,
  ILanguageModel,
  ILanguageModelMessage,
  ILanguageModelProvider,
  ILanguageModelResponse,
} from "./types";
import type { IStateStore } from "../utils/stateStore";

// ===========================================================================
// VS Code API adapters
//
// Bridges the generation interfaces to the Language Model API, cancellation
// tokens and globalState. This is the ONLY file in the generation module
// that imports `vscode` directly.
// ===========================================================================

// ---------------------------------------------------------------------------
// Language Model Provider
// ---------------------------------------------------------------------------

export class VsCodeLanguageModelProvider implements ILanguageModelProvider {
  async selectModels(selector: {
    vendor: string;
    family?: string;
  }): Promise<ILanguageModel[]> {
    const models = await vscode.lm.selectChatModels(selector);
    return models.map((m) => new VsCodeLanguageModel(m));
  }
}

class VsCodeLanguageModel implements ILanguageModel {
  constructor(private readonly model: vscode.LanguageModelChat) {}

  get id(): string {
    return this.model.id;
  }
  get vendor(): string {
    return this.model.vendor;
  }
  get family(): string {
    return this.model.family;
  }
  get name(): string {
    return this.model.name;
  }
  get maxInputTokens(): number {
    return this.model.maxInputTokens;
  }

  async sendRequest(
    messages: readonly ILanguageModelMessage[],
    options: Record<string, unknown>,
    token: ICancellationToken
  ): Promise<ILanguageModelResponse> {
    const vscodeMessages = messages.map((m) =>
      m.role === "user"
        ? vscode.LanguageModelChatMessage.User(m.content)
        : vscode.LanguageModelChatMessage.Assistant(m.content)
    );

    // Mirror our token onto a real one for the API; released with the stream
    const linked = new vscode.CancellationTokenSource();
    const subscription = token.onCancellationRequested(() => linked.cancel());
    if (token.isCancellationRequested) linked.cancel();
    const release = (): void => {
      subscription.dispose();
      linked.dispose();
    };

    try {
      const response = await this.model.sendRequest(
        vscodeMessages,
        { modelOptions: options },
        linked.token
      );
      return { text: releasing(response.text, release) };
    } catch (err) {
      release();
      throw err;
    }
  }
}

async function* releasing(
  text: AsyncIterable<string>,
  release: () => void
): AsyncIterable<string> {
  try {
    yield* text;
  } finally {
    release();
  }
}

// ---------------------------------------------------------------------------
// Cancellation Token Source Factory
// ---------------------------------------------------------------------------

export class VsCodeCancellationTokenSourceFactory
  implements ICancellationTokenSourceFactory
{
  create(): ICancellationTokenSource {
    const source = new vscode.CancellationTokenSource();
    return {
      token: {
        get isCancellationRequested() {
          return source.token.isCancellationRequested;
        },
        onCancellationRequested(listener: () => void) {
          return source.token.onCancellationRequested(listener);
        },
      },
      cancel: () => source.cancel(),
      dispose: () => source.dispose(),
    };
  }
}

// ---------------------------------------------------------------------------
// State Store (provider accuracy persistence)
// ---------------------------------------------------------------------------

export class VsCodeStateStoreAdapter implements IStateStore {
  constructor(private readonly globalState: vscode.Memento) {}

  async save(key: string, state: unknown): Promise<void> {
    await this.globalState.update(`promptpatch.state.${key}`, state);
  }

  async load(key: string): Promise<unknown> {
    return this.globalState.get<unknown>(`promptpatch.state.${key}`) ?? null;
  }

  async delete(key: string): Promise<void> {
    await this.globalState.update(`promptpatch.state.${key}`, undefined);
  }
}
