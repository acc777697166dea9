/**
 * @hebrew שגיאה בתור הניגון: מיקום מחוץ לתור, עמוד לא תקין מהשרת,
 * או פריט שלא ניתן לטעון.
 */
export class QueueError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'QueueError';
  }
}
