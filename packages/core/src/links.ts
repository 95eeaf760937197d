import { find } from 'linkifyjs';

export function detectLinks(text: string): string[] {
  return find(text, 'url').map((match) => match.value);
}
