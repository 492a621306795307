const CYRILLIC_TO_LATIN: Record<string, string> = {
  а: 'a',
  б: 'b',
  в: 'v',
  г: 'g',
  д: 'd',
  е: 'e',
  ё: 'e',
  ж: 'zh',
  з: 'z',
  и: 'i',
  й: 'i',
  к: 'k',
  л: 'l',
  м: 'm',
  н: 'n',
  о: 'o',
  п: 'p',
  р: 'r',
  с: 's',
  т: 't',
  у: 'u',
  ф: 'f',
  х: 'kh',
  ц: 'ts',
  ч: 'ch',
  ш: 'sh',
  щ: 'shch',
  ъ: '',
  ы: 'y',
  ь: '',
  э: 'e',
  ю: 'iu',
  я: 'ia',
};

export const SLUG_FALLBACK = 'schedule';

export function transliterate(text: string): string {
  let result = '';
  for (const ch of text.toLowerCase()) {
    result += CYRILLIC_TO_LATIN[ch] ?? ch;
  }
  return result;
}

export function slug(groupName: string): string {
  // ё/й decompose under NFKD, so transliterate before stripping marks
  const latin = transliterate(groupName.trim());
  const result = latin
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');

  return result || SLUG_FALLBACK;
}

export function calendarFileNames(groupName: string): {
  mobile: string;
  google: string;
} {
  const base = `schedule_${slug(groupName)}`;
  return { mobile: `${base}.ics`, google: `${base}_google.ics` };
}
