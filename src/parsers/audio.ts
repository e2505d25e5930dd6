import { ParseInput, ParseResult, ParserStrategy } from './types.js';
import { TranscriptionProvider } from '../types/provider.js';
import { paragraphBlocks } from './text.js';
import { ConfigurationError } from '../utils/errors.js';

export class AudioTranscriptParser implements ParserStrategy {
  readonly name = 'audio-transcript';

  constructor(private transcriber: TranscriptionProvider | null) {}

  isAvailable(): boolean {
    return this.transcriber !== null;
  }

  async tryParse(input: ParseInput): Promise<ParseResult> {
    if (!this.transcriber) {
      throw new ConfigurationError('No transcription provider configured');
    }
    const text = await this.transcriber.transcribeAudio(input.bytes, input.filename);
    return { markdown: text, blocks: paragraphBlocks(text), engine: this.name };
  }
}
