/**
 * Input for a single subtitle translation prompt
 */
export interface TranslationPromptInput {
  /** Markup-free source subtitle text */
  sourceText: string;
  /** Display name of the source language (e.g. "English") */
  sourceLanguage: string;
  /** Display name of the target language (e.g. "Portuguese") */
  targetLanguage: string;
  /** Run-wide reference sample in the target language */
  globalGuide: string;
  /** Labelled reference lines around the current position */
  localWindow: string;
}

/**
 * Label the prompt ends with; models sometimes echo it back
 */
export function translationLabel(targetLanguage: string): string {
  return `${targetLanguage.toUpperCase()} TRANSLATION:`;
}

/**
 * Prompt template for translating one subtitle entry
 */
export function buildTranslationPrompt(input: TranslationPromptInput): string {
  const { sourceText, sourceLanguage, targetLanguage, globalGuide, localWindow } = input;

  let prompt = `You are a professional translator specializing in ${sourceLanguage} to ${targetLanguage} translation for subtitles.

IMPORTANT CONTEXT - TRANSLATION GUIDE:
Here are some professional ${targetLanguage} translations from the same content to use as reference for style, tone, and terminology:

${globalGuide}

`;

  if (localWindow) {
    prompt += `CONTEXTUAL REFERENCE - NEARBY ENTRIES:
Here are ${targetLanguage} translations from nearby subtitle entries to help maintain context and consistency:

${localWindow}

`;
  }

  prompt += `TASK:
Translate the following ${sourceLanguage} subtitle text to ${targetLanguage}. The translation should:
1. Be natural and fluent ${targetLanguage}
2. Match the style and tone of the reference translations above
3. Maintain the same meaning and intent as the original
4. Be appropriate for subtitle format (concise but clear)
5. Use proper ${targetLanguage} conventions
6. Be consistent with the contextual nearby entries provided

CRITICAL: Return ONLY the ${targetLanguage} translation. Do not include any explanations, comments, or additional text.

${sourceLanguage.toUpperCase()} TEXT TO TRANSLATE:
${sourceText}

${translationLabel(targetLanguage)}`;

  return prompt;
}
