/**
 * @hebrew תיאור ההתקן חסר או שאינו מתאים לנגן (אין שם, אין UDN, או שחסר שירות נדרש).
 */
export class DeviceValidationError extends Error {
  constructor(message: string, public readonly locationUrl: string) {
    super(message);
    this.name = 'DeviceValidationError';
  }
}

export class ServiceNotFoundError extends Error {
  constructor(public readonly serviceType: string) {
    super(`Service type not found: ${serviceType}`);
    this.name = 'ServiceNotFoundError';
  }
}

export class ActionNotFoundError extends Error {
  constructor(public readonly actionName: string, serviceType?: string) {
    super(serviceType ? `No such action ${actionName} on ${serviceType}` : `Action not found: ${actionName}`);
    this.name = 'ActionNotFoundError';
  }
}

/**
 * @hebrew הועבר ערך בודד לפעולה שדורשת יותר מארגומנט אחד (או אף אחד).
 */
export class ActionArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ActionArgumentError';
  }
}
