import stopWordList from './data/stopwords.json' with { type: 'json' };

const STOP_WORDS: ReadonlySet<string> = new Set(stopWordList);
const TERM_RE = /\p{L}{5,}/gu;
const MAX_HEADING_TOPICS = 5;
const MAX_HEADING_WORDS = 4;

/**
 * 主題萃取：短標題片語優先，再依詞頻補滿
 * 詞：至少 5 個字母、非停用詞；同頻率依字母順序
 */
export class TopicExtractor {
  constructor(private readonly maxTopics: number = 20) {}

  extract(headings: readonly string[], texts: readonly string[]): string[] {
    const topics: string[] = [];
    const seen = new Set<string>();
    const add = (topic: string) => {
      if (topics.length >= this.maxTopics || seen.has(topic)) return;
      seen.add(topic);
      topics.push(topic);
    };

    let headingTopics = 0;
    for (const heading of headings) {
      if (headingTopics >= MAX_HEADING_TOPICS) break;
      const phrase = heading.toLowerCase().replace(/[^\p{L}\p{N}\s-]/gu, ' ').replace(/\s+/g, ' ').trim();
      const words = phrase.split(' ').filter(Boolean);
      if (words.length === 0 || words.length > MAX_HEADING_WORDS) continue;
      if (words.length === 1 && STOP_WORDS.has(words[0])) continue;
      if (!seen.has(phrase)) headingTopics++;
      add(phrase);
    }

    for (const term of this.rankTerms([...headings, ...texts])) add(term);
    return topics;
  }

  private rankTerms(texts: readonly string[]): string[] {
    const freq = new Map<string, number>();
    for (const text of texts) {
      for (const match of text.toLowerCase().matchAll(TERM_RE)) {
        const word = match[0];
        if (STOP_WORDS.has(word)) continue;
        freq.set(word, (freq.get(word) ?? 0) + 1);
      }
    }
    return [...freq.entries()]
      .sort((a, b) => b[1] - a[1] || (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0))
      .map(([word]) => word);
  }
}
