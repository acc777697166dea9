import type { AxiosRequestConfig } from 'axios';

// ==========================================================================================
// HTTP
// ==========================================================================================

export interface HttpResponse {
  status: number;
  data: unknown;
}

/**
 * @hebrew החלק של מופע axios שהספרייה משתמשת בו.
 * מאפשר להזריק לקוח HTTP מזויף בבדיקות.
 */
export interface HttpClient {
  get(url: string, config?: AxiosRequestConfig): Promise<HttpResponse>;
  post(url: string, data?: unknown, config?: AxiosRequestConfig): Promise<HttpResponse>;
  request(config: AxiosRequestConfig): Promise<HttpResponse>;
}

// ==========================================================================================
// Service descriptions (SCPD)
// ==========================================================================================

export type ArgumentDirection = 'in' | 'out';

export interface ActionArgument {
  name: string;
  direction: ArgumentDirection;
  relatedStateVariable?: string;
}

export interface Action {
  name: string;
  arguments: ActionArgument[];
}

export interface AllowedValueRange {
  minimum?: string;
  maximum?: string;
  step?: string;
}

export interface StateVariable {
  name: string;
  dataType?: string;
  sendEvents?: boolean;
  defaultValue?: string;
  allowedValues?: string[];
  allowedValueRange?: AllowedValueRange;
}

/** תוכן מסמך SCPD של שירות, נטען פעם אחת בלבד. */
export interface ServiceSpec {
  actions: Action[];
  stateVariables: StateVariable[];
}

export interface ServiceDescription {
  serviceType: string;
  serviceId?: string;
  controlURL: string;
  eventSubURL: string;
  SCPDURL: string;
}

export interface DeviceDescription {
  friendlyName?: string;
  modelDescription?: string;
  modelName?: string;
  manufacturer?: string;
  UDN?: string;
  services: ServiceDescription[];
}

// ==========================================================================================
// SOAP
// ==========================================================================================

export type ActionValue = string | number | boolean;
export type ActionArgs = Record<string, ActionValue>;

/** מיפוי ארגומנטים, או ערך בודד שיוצמד לארגומנט היחיד שאין לו ברירת מחדל. */
export type ActionData = ActionArgs | ActionValue;

export type ActionResult = Record<string, ActionValue>;

export interface SoapFault {
  faultCode: string;
  faultString: string;
  detail?: string;
  upnpErrorCode?: number;
  upnpErrorDescription?: string;
}

export type SoapOutcome =
  | { kind: 'result'; values: ActionResult }
  | { kind: 'fault'; fault: SoapFault }
  | { kind: 'connection-error'; error: Error }
  | { kind: 'error'; error: Error };

// ==========================================================================================
// Collaborators
// ==========================================================================================

/**
 * @hebrew מקור לשמות חלופיים (alias) להתקנים.
 * מחזיר את השם שיוצג עבור ההתקן, או את השם המקורי אם אין כינוי.
 */
export interface NameAliasResolver {
  resolveAlias(uuid: string, name: string, ip: string): string | Promise<string>;
}

/** הכתובת שבה השרת החיצוני מקבל אירועי GENA. */
export interface EventCallbackHost {
  hostIp: string | null;
  httpPort: number;
}

/**
 * @hebrew מה ששירות צריך לדעת על ההתקן שמחזיק אותו.
 */
export interface ServiceHost {
  readonly name: string;
  readonly locationUrl: string;
  eventCallbackUrl(): string | null;
  recordSuccess(): void;
  recordConnectionFailure(action: string, error: Error): void;
}

export interface UpnpDeviceOptions {
  http?: HttpClient;
  aliasResolver?: NameAliasResolver;
  /** דגם ברירת מחדל כשבתיאור ההתקן אין modelDescription */
  defaultModel?: string;
  callbackHost?: EventCallbackHost;
}
