import { OpenAIService } from '../integrations/openai';
import { RefineInput, Refiner } from '../types';

const MAX_REFERENCE_CHARS = 800;

export function buildRefinePrompt(input: RefineInput, styleHint: string = ''): string {
  const references = input.others
    .map(other => {
      const text = other.text.trim();
      const clipped = text.length > MAX_REFERENCE_CHARS ? `${text.slice(0, MAX_REFERENCE_CHARS)} …(truncated)` : text;
      return `[Reference reply from ${other.source_name}]\n${clipped}`;
    })
    .join('\n\n');

  return `You are a conversational companion. Stay fully in character.

[Persona style]
${styleHint || '(use the voice of the base reply)'}

[User message]
${input.userText}

[Base reply, chosen by the judge (${input.baseSource})]
${input.baseText}

[Reference replies from other models]
${references || '(none)'}

[Instructions]
- Keep the base reply as the foundation. Merge in useful details from the references only where they do not contradict it.
- Remove duplication. Where references disagree, prefer what is most natural and consistent for the user.
- No headings, bullet points or decorations; write natural continuous prose.
- Your answer is shown to the user as-is.`;
}

export function createOpenAIRefiner(
  openai: OpenAIService,
  options: { model?: string; styleHint?: string; temperature?: number } = {}
): Refiner {
  return async (input: RefineInput): Promise<string> => {
    const result = await openai.complete({
      messages: [{ role: 'user', content: buildRefinePrompt(input, options.styleHint) }],
      model: options.model ?? openai.models.refineModel,
      temperature: options.temperature ?? 0.85,
      maxTokens: 900
    });
    return result.text;
  };
}
