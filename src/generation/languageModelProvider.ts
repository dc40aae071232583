import { GenerationError, isPromptPatchError } from "../utils/errors";
import type {
  GenerationContext,
  ICancellationToken,
  IGenerationProvider,
  ILanguageModel,
  ILanguageModelMessage,
  ILanguageModelProvider,
} from "./types";

// ===========================================================================
// LanguageModelGenerationProvider
//
// IGenerationProvider over the Language Model API. Selects a chat model by
// vendor/family (falling back to any model of the vendor) and collects the
// streamed response into one string.
// ===========================================================================

export interface ModelSelector {
  readonly vendor: string;
  readonly family?: string;
}

const SYSTEM_INSTRUCTION =
  "You are a code generator embedded in an editor. Reply with code only, " +
  "in the language of the file, without commentary.";

export class LanguageModelGenerationProvider implements IGenerationProvider {
  readonly id: string;

  constructor(
    private readonly lmProvider: ILanguageModelProvider,
    private readonly selector: ModelSelector
  ) {
    this.id = selector.family ? `${selector.vendor}/${selector.family}` : selector.vendor;
  }

  async generate(
    prompt: string,
    context: GenerationContext,
    token: ICancellationToken
  ): Promise<string> {
    const model = await this.selectModel();
    if (!model) {
      throw new GenerationError(this.id, "no language model available");
    }

    const messages: ILanguageModelMessage[] = [
      { role: "user", content: `${SYSTEM_INSTRUCTION}\n\nFile: ${context.filePath} (${context.language})\n\n${prompt}` },
    ];

    try {
      const response = await model.sendRequest(messages, {}, token);

      let output = "";
      for await (const chunk of response.text) {
        if (token.isCancellationRequested) {
          throw new GenerationError(this.id, "cancelled");
        }
        output += chunk;
      }
      return output;
    } catch (err) {
      if (isPromptPatchError(err)) throw err;
      const detail = err instanceof Error ? err.message : String(err);
      throw new GenerationError(this.id, detail, err);
    }
  }

  async validate(): Promise<boolean> {
    return (await this.selectModel()) !== undefined;
  }

  private async selectModel(): Promise<ILanguageModel | undefined> {
    const { vendor, family } = this.selector;

    if (family) {
      const direct = await this.lmProvider.selectModels({ vendor, family });
      if (direct.length > 0) return direct[0];
    }

    const any = await this.lmProvider.selectModels({ vendor });
    return any[0];
  }
}
