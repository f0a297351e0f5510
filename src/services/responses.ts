import fs from 'fs';
import { KeywordReply, TemplateName } from '../types/index';
import { isRecord, log } from '../utils/helpers';

const TEMPLATE_PREFIX = '_';

export type LoadResult = 'loaded' | 'missing' | 'invalid';

export class ResponseTable {
  private keywords: KeywordReply[] = [];
  private templates = new Map<string, string>();
  private filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  load(): LoadResult {
    let raw: string;
    try {
      raw = fs.readFileSync(this.filePath, 'utf-8');
    } catch (error) {
      log('warn', 'Responses file not readable, using an empty table', { path: this.filePath, error: String(error) });
      this.keywords = [];
      this.templates = new Map();
      return 'missing';
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      log('error', 'Responses file is not valid JSON, keeping current table', { path: this.filePath, error: String(error) });
      return 'invalid';
    }
    if (!isRecord(parsed)) {
      log('error', 'Responses file is not a JSON object, keeping current table', { path: this.filePath });
      return 'invalid';
    }

    const keywords: KeywordReply[] = [];
    const templates = new Map<string, string>();
    for (const [key, value] of Object.entries(parsed)) {
      if (typeof value !== 'string') continue;
      if (key.startsWith(TEMPLATE_PREFIX)) {
        templates.set(key.slice(TEMPLATE_PREFIX.length), value);
      } else if (key.trim()) {
        keywords.push({ keyword: key.toLowerCase(), reply: value });
      }
    }

    this.keywords = keywords;
    this.templates = templates;
    log('info', `Loaded ${keywords.length} keyword replies and ${templates.size} templates`);
    return 'loaded';
  }

  match(text: string): string | null {
    const message = text.toLowerCase();
    const hit = this.keywords.find(entry => message.includes(entry.keyword));
    return hit ? hit.reply : null;
  }

  template(name: TemplateName): string | undefined {
    return this.templates.get(name);
  }

  get keywordCount(): number {
    return this.keywords.length;
  }
}
