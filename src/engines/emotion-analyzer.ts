import { OpenAIService } from '../integrations/openai';
import { EmotionAnalysisInput, EmotionAnalyzer } from '../types/collaborators';
import { ChatMessage, EmotionSignal, SIGNAL_COMPONENTS, SignalComponent } from '../types';
import { CompanionError, describeError } from '../utils/errors';
import { emotionSignalSchema } from '../utils/schemas';
import { ModeSelector } from './mode-selector';
import { neutralSignal } from './emotion-state';

const ANALYSIS_SYSTEM_PROMPT = `You are an emotion analysis component.
Estimate the companion character's own emotional state from her latest reply.
When a previous state is given, treat it as the starting point and move away
from it only as far as the reply shows.

Output a JSON object only, with no commentary:
{
  "mode": "normal" | "erotic" | "debate",
  "affection": 0.0-1.0,
  "arousal": 0.0-1.0,
  "tension": 0.0-1.0,
  "anger": 0.0-1.0,
  "sadness": 0.0-1.0,
  "excitement": 0.0-1.0
}

- affection: warmth, trust and fondness toward the user
- arousal: romantic or physical excitement
- tension: nervousness, unease
- anger: irritation, frustration
- sadness: sorrow, loneliness
- excitement: eagerness, thrill`;

export function buildAnalysisMessages(input: EmotionAnalysisInput): ChatMessage[] {
  const lines = ['=== Latest composed reply ==='];
  if (input.sourceName) lines.push(`(source: ${input.sourceName})`);
  lines.push(input.composedText || '(empty)');

  if (input.userText) {
    lines.push('', '=== Latest user text ===', input.userText);
  }

  // Starting point for the estimate; the reply decides how far it moves
  const previous = input.previous;
  if (previous) {
    lines.push(
      '',
      '=== Emotional state before this reply ===',
      `mode ${previous.mode}; ` +
        SIGNAL_COMPONENTS.map(component => `${component} ${previous[component].toFixed(2)}`).join(', '),
      `relationship ${previous.relationship_level.toFixed(1)} (${previous.relationship_stage})`
    );
  }

  return [
    { role: 'system', content: ANALYSIS_SYSTEM_PROMPT },
    { role: 'user', content: lines.join('\n') }
  ];
}

export function parseEmotionJson(raw: string): EmotionSignal {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new CompanionError('emotion_analysis_failed', `Analyzer reply is not JSON: ${describeError(error)}`);
  }

  const parsed = emotionSignalSchema.safeParse(data);
  if (!parsed.success) {
    throw new CompanionError(
      'emotion_analysis_failed',
      `Analyzer reply has the wrong shape: ${parsed.error.issues.map(i => i.message).join(', ')}`
    );
  }
  return parsed.data;
}

export class OpenAIEmotionAnalyzer implements EmotionAnalyzer {
  private openai: OpenAIService;
  private model?: string;

  constructor(openai: OpenAIService, model?: string) {
    this.openai = openai;
    this.model = model;
  }

  async analyze(input: EmotionAnalysisInput): Promise<EmotionSignal> {
    const result = await this.openai.complete({
      messages: buildAnalysisMessages(input),
      model: this.model ?? this.openai.models.analysisModel,
      temperature: 0.1,
      maxTokens: 320,
      jsonMode: true
    });
    return parseEmotionJson(result.text);
  }
}

const CUE_WORDS: Record<SignalComponent, string[]> = {
  affection: ['love', 'glad', 'thank', 'happy', 'dear', 'warm', 'miss you', 'together'],
  arousal: ['kiss', 'hold me', 'closer', 'blush', 'heart racing', 'embrace'],
  tension: ['nervous', 'worried', 'uneasy', 'afraid', 'anxious', 'careful'],
  anger: ['angry', 'annoyed', 'unfair', 'stop it', 'ridiculous', 'frustrat'],
  sadness: ['sad', 'sorry', 'lonely', 'cry', 'tears', 'miss'],
  excitement: ['!', 'wow', 'amazing', "can't wait", 'exciting', 'let\'s go']
};

const CUE_WEIGHT = 0.25;

/**
 * Keyword-count analyzer for offline runs. Each cue hit adds a fixed weight to
 * its component, capped at 1; the mode is picked from the resulting signal.
 */
export class HeuristicEmotionAnalyzer implements EmotionAnalyzer {
  private modeSelector: ModeSelector;

  constructor(modeSelector: ModeSelector = new ModeSelector()) {
    this.modeSelector = modeSelector;
  }

  async analyze(input: EmotionAnalysisInput): Promise<EmotionSignal> {
    const text = input.composedText.toLowerCase();
    const signal = neutralSignal();

    for (const component of SIGNAL_COMPONENTS) {
      const hits = CUE_WORDS[component].reduce((count, cue) => count + countOccurrences(text, cue), 0);
      signal[component] = Math.min(1, hits * CUE_WEIGHT);
    }

    signal.mode = this.modeSelector.selectMode(signal);
    return signal;
  }
}

function countOccurrences(text: string, cue: string): number {
  if (cue.length === 0) return 0;
  let count = 0;
  let index = text.indexOf(cue);
  while (index !== -1) {
    count++;
    index = text.indexOf(cue, index + cue.length);
  }
  return count;
}
