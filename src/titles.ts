import path from 'node:path';

// Release tags that follow the title in scene-style names; everything from the first one on is dropped.
const NOISE_TOKEN =
  /^(\d{3,4}[pi]|4k|uhd|x26[45]|h26[45]|hevc|avc|av1|xvid|divx|blu-?ray|bdrip|brrip|web-?dl|web-?rip|hdtv|dvd-?rip|dvd|remux|hdr|hdr10|10bit|8bit|aac|ac3|eac3|dts|ddp?5|atmos|proper|repack|extended|unrated|internal|limited)(-.*)?$/i;

const EPISODE_MARKER = /\b(s\d{1,2}e\d{1,3}|\d{1,2}x\d{2,3}|season\s*\d+)\b/i;
const YEAR = /^(19|20)\d{2}$/;

// Human-facing name for a source file: extension, bracketed group tags,
// separators and trailing release tags removed.
export function deriveDisplayName(fileName: string): string {
  const base = path.parse(fileName).name;
  const spaced = base
    .replace(/\[[^\]]*\]|\{[^}]*\}/g, ' ')
    .replace(/[._]+/g, ' ')
    .trim();
  const tokens = spaced.split(/\s+/).filter(Boolean);

  const firstNoise = tokens.findIndex((token) => NOISE_TOKEN.test(token));
  const kept = firstNoise > 0 ? tokens.slice(0, firstNoise) : tokens;
  const name = kept.join(' ').trim();
  return name.length > 0 ? name : base;
}

export type TitleQuery = {
  title: string;
  year?: number;
  episodic: boolean; // an episode or season marker was present
};

// Lookup query for the identification service: episode markers, year markers
// and parenthesised notes removed from a display name.
export function buildTitleQuery(displayName: string): TitleQuery {
  let text = displayName;
  let year: number | undefined;

  const episode = EPISODE_MARKER.exec(text);
  if (episode) text = text.slice(0, episode.index);

  const parenthesisedYear = /\(((?:19|20)\d{2})\)/.exec(text);
  if (parenthesisedYear) {
    year = Number(parenthesisedYear[1]);
    text = text.replace(parenthesisedYear[0], ' ');
  }
  text = text.replace(/\([^)]*\)/g, ' ');

  const tokens = text.split(/\s+/).filter(Boolean);
  const last = tokens[tokens.length - 1];
  if (tokens.length > 1 && last !== undefined && YEAR.test(last)) {
    tokens.pop();
    year ??= Number(last);
  }

  const title = tokens
    .join(' ')
    .replace(/[^\w\s-]/g, '')
    .replace(/\s+/g, ' ')
    .trim()
    .replace(/-+$/, '')
    .trim();
  return { title, year, episodic: episode !== null };
}

// Equal ignoring case and punctuation
export function sameTitle(a: string, b: string): boolean {
  const norm = (s: string) => s.toLowerCase().replace(/[^a-z0-9]+/g, '');
  return norm(a) === norm(b);
}
