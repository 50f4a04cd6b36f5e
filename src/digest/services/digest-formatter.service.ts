import { Injectable } from '@nestjs/common';
import {
  MOBILE_TLDR_MAX_STORIES,
  MOBILE_TLDR_MAX_THEMES,
  MOBILE_TLDR_TITLE_CHARS,
} from '../config/digest.constants';
import { escapeHtml } from '../utils/text.util';

const RULE = '='.repeat(50);

export interface SubjectAndBody {
  subject: string;
  body: string;
}

@Injectable()
export class DigestFormatterService {
  parseSubjectAndBody(text: string, fallbackSubject: string): SubjectAndBody {
    const lines = (text || '').split(/\r?\n/);
    const first = (lines[0] ?? '').trim();
    if (first.toLowerCase().startsWith('subject:')) {
      return {
        subject: first.slice('subject:'.length).trim() || fallbackSubject,
        body: lines.slice(1).join('\n').trim(),
      };
    }
    return { subject: fallbackSubject, body: lines.join('\n').trim() };
  }

  /**
   * Quick-scan block for small screens: the top insight (two lines), up to
   * three theme bullets and up to five story headlines.
   */
  createMobileTldr(text: string, subject: string): string {
    const lines = (text || '').split(/\r?\n/);
    const out: string[] = ['QUICK SCAN', `Subject: ${subject}`, RULE];

    const insight = this.sectionLines(lines, 'TOP INSIGHT')
      .filter((line) => !line.startsWith('•'))
      .slice(0, 2);
    if (insight.length > 0) {
      out.push('', "TODAY'S INSIGHT:", insight.join(' '));
    }

    const themes = this.sectionLines(lines, 'KEY THEMES')
      .filter((line) => line.startsWith('•'))
      .slice(0, MOBILE_TLDR_MAX_THEMES);
    if (themes.length > 0) {
      out.push('', 'KEY THEMES:', ...themes);
    }

    const stories = lines
      .filter((line) => line.startsWith('## '))
      .slice(0, MOBILE_TLDR_MAX_STORIES)
      .map((line, index) => {
        const title = line.slice(3).trim().replace(/^\d+\.\s+/, '');
        return `  ${index + 1}. ${title.slice(0, MOBILE_TLDR_TITLE_CHARS)}`;
      });
    out.push('', 'STORIES:', ...stories);
    out.push('', `${stories.length} stories in the full digest below`, RULE);

    return out.join('\n');
  }

  toHtml(body: string, mobileTldr?: string | null): string {
    const tldrBlock = mobileTldr
      ? `<div style="background-color: #f0f8ff; padding: 15px; margin-bottom: 20px; border-left: 4px solid #0066cc;">${escapeHtml(mobileTldr).replace(/\n/g, '<br>')}</div>`
      : '';
    const bodyHtml = escapeHtml(body)
      .replace(/\n\n/g, '</p><p>')
      .replace(/\n/g, '<br>');

    return `<html><body style="font-family: system-ui, -apple-system, sans-serif; line-height: 1.6; max-width: 700px; margin: 0 auto; padding: 20px;">${tldrBlock}<p>${bodyHtml}</p></body></html>`;
  }

  toPlainText(body: string, mobileTldr?: string | null): string {
    return mobileTldr ? `${mobileTldr}\n\n${body}` : body;
  }

  // non-empty trimmed lines after the heading, up to the next `===` or `##`
  private sectionLines(lines: string[], heading: string): string[] {
    const start = lines.findIndex((line) =>
      line.toUpperCase().includes(heading),
    );
    if (start === -1) {
      return [];
    }
    const collected: string[] = [];
    for (const line of lines.slice(start + 1)) {
      if (line.startsWith('===') || line.startsWith('##')) {
        break;
      }
      if (line.trim()) {
        collected.push(line.trim());
      }
    }
    return collected;
  }
}
