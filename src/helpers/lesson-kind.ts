export type LessonKind = 'lecture' | 'seminar' | 'exam' | 'credit' | 'other';

export const LESSON_KIND_LETTERS: Record<Exclude<LessonKind, 'other'>, string> =
  {
    lecture: 'Л',
    seminar: 'С',
    exam: 'Э',
    credit: 'З',
  };

export const DEFAULT_KIND_LETTER = 'Д';

export function getLessonKind(lessonType: string | null | undefined): LessonKind {
  const normalized = (lessonType ?? '').trim().toLowerCase();
  if (!normalized) return 'other';
  if (normalized.includes('лекц')) return 'lecture';
  if (
    normalized.includes('семинар') ||
    normalized.includes('практ') ||
    normalized.includes('лаб')
  ) {
    return 'seminar';
  }
  if (normalized.includes('экзам')) return 'exam';
  if (normalized.includes('зач')) return 'credit';
  return 'other';
}

export function getLessonLetter(lessonType: string | null | undefined): string {
  const kind = getLessonKind(lessonType);
  if (kind !== 'other') return LESSON_KIND_LETTERS[kind];

  const first = (lessonType ?? '').trim().charAt(0);
  return first ? first.toUpperCase() : DEFAULT_KIND_LETTER;
}

export const TITLE_SHORTCUTS: Record<string, string> = {
  'математический анализ': 'МатАн',
  'линейная алгебра': 'Линал',
  'иностранный язык': 'Ин. яз.',
  'физическая культура и спорт': 'Физра',
  'элективные дисциплины по физической культуре и спорту': 'Физра',
  'теория вероятностей и математическая статистика': 'ТВиМС',
  'информационные технологии в профессиональной деятельности': 'ИТ в ПД',
  'безопасность жизнедеятельности': 'БЖД',
  'история россии': 'История',
  'микроэкономика': 'Микра',
  'макроэкономика': 'Макра',
};

export function getTitleShortcut(title: string): string {
  return TITLE_SHORTCUTS[title.trim().toLowerCase()] ?? title.trim();
}
