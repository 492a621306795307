import { Markup } from 'telegraf';

export const BUTTON_TEXT_WEEKLY = '📅 Расписание недели';
export const BUTTON_TEXT_ICS = '📂 Получить .ics';

export function getMainKeyboard() {
  return Markup.keyboard([[BUTTON_TEXT_WEEKLY, BUTTON_TEXT_ICS]]).resize();
}
