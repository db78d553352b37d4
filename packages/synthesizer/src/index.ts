export type { SynthesisResult, SynthesizerOptions } from './Synthesizer';
export { serializeTemplate, synthesize, Synthesizer } from './Synthesizer';
export { DEFAULT_OUT_DIR, TEMPLATE_SUFFIX, TemplateWriter, validateTemplateDocument } from './TemplateWriter';
