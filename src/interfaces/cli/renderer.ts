/**
 * Terminal rendering of a relayed transcript. Region markers are consumed and
 * the text they enclose is coloured instead.
 */

import chalk from 'chalk';
import type { Delta } from '../../models/base.js';
import { TagScanner, CODE_TAG, OUTPUT_TAG, type ScanEvent } from '../../stream/tag-scanner.js';

type Style = (text: string) => string;

export interface TranscriptStyles {
  reasoning: Style;
  answer: Style;
  code: Style;
  output: Style;
}

export const DEFAULT_STYLES: TranscriptStyles = {
  reasoning: text => chalk.gray.italic(text),
  answer: text => text,
  code: text => chalk.hex('#00af5f')(text),
  output: text => chalk.hex('#ffaf00')(text),
};

export class TranscriptRenderer {
  private scanner = new TagScanner();
  private answering = false;
  private styles: TranscriptStyles;

  constructor(styles: TranscriptStyles = DEFAULT_STYLES) {
    this.styles = styles;
  }

  render(delta: Delta): string {
    let out = '';

    if (delta.reasoningText) {
      out += this.paint(this.scanner.feed(delta.reasoningText), this.styles.reasoning);
    }

    if (delta.answerText) {
      if (!this.answering) {
        this.answering = true;
        out += this.paint(this.scanner.flush(), this.styles.reasoning);
        this.scanner.reset();
        out += '\n';
      }
      out += this.paint(this.scanner.feed(delta.answerText), this.styles.answer);
    }

    return out;
  }

  /** Whatever the scanner still holds once the stream is over. */
  finish(): string {
    return this.paint(this.scanner.flush(), this.answering ? this.styles.answer : this.styles.reasoning);
  }

  private paint(events: ScanEvent[], base: Style): string {
    return events
      .map(event => {
        if (event.type !== 'text') return '';
        if (event.region === CODE_TAG) return this.styles.code(event.text);
        if (event.region === OUTPUT_TAG) return this.styles.output(event.text);
        return base(event.text);
      })
      .join('');
  }
}
