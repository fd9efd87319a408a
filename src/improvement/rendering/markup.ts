/**
 * Markdown to HTML rendering for improved resumes
 */

import { Marked } from 'marked';
import type { MarkupRenderer } from '../types';

export class MarkedRenderer implements MarkupRenderer {
  private readonly marked = new Marked({ gfm: true, async: false });

  render(markdown: string): string {
    const html = this.marked.parse(markdown);
    if (typeof html !== 'string') {
      throw new Error('Markdown renderer returned a promise; async extensions are not supported');
    }
    return html;
  }
}
