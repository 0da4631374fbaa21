export { ContactService } from './ContactService.js';
export type { ContactServiceOptions } from './ContactService.js';
export { selectUpcomingBirthdays, UPCOMING_BIRTHDAY_WINDOW_DAYS } from './birthdays.js';
