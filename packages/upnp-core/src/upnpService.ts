import type {
  Action,
  ActionArgs,
  ActionArgument,
  ActionData,
  ActionResult,
  HttpClient,
  ServiceDescription,
  ServiceHost,
  ServiceSpec,
  StateVariable,
} from './types';
import { ActionArgumentError, ActionNotFoundError } from './errors';
import { createModuleLogger } from './logger';
import { sendSoapRequest } from './upnpSoapClient';
import { asArray, attribute, childNode, childText, isXmlNode, parseXml, stripDefaultNamespace, type XmlNode } from './xmlUtils';
import { defaultHttpClient, delay, toError } from './utils';

const logger = createModuleLogger('upnpService');

/** ערכים שנשלחים כשהקורא לא סיפק אותם */
export const DEFAULT_ACTION_DATA: Readonly<ActionArgs> = Object.freeze({
  InstanceID: 0,
  Channel: 'Master',
  CurrentURIMetaData: '',
  NextURIMetaData: '',
  Unit: 'REL_TIME',
  Speed: 1,
});

export const DEFAULT_SUBSCRIBE_TIMEOUT_SEC = 120;
const SPEC_FETCH_TIMEOUT_MS = 10_000;
const SUBSCRIBE_REQUEST_TIMEOUT_MS = 10_000;

function isDefaultable(name: string): boolean {
  return Object.prototype.hasOwnProperty.call(DEFAULT_ACTION_DATA, name);
}

function isScalar(data: ActionData): data is string | number | boolean {
  return typeof data !== 'object';
}

/**
 * @hebrew מתאים את הנתונים שהקורא העביר לרשימת הארגומנטים של הפעולה.
 *
 * ערך בודד נקשר לארגומנט הקלט היחיד שאין לו ברירת מחדל. אם כל הארגומנטים
 * ניתנים לברירת מחדל, הוא נקשר לארגומנט היחיד שאינו InstanceID.
 * ארגומנטים עם ברירת מחדל שלא סופקו נלקחים מ-DEFAULT_ACTION_DATA.
 * הסדר בתוצאה הוא סדר הארגומנטים במסמך ה-SCPD.
 */
export function buildActionArguments(action: Action, data: ActionData): ActionArgs {
  const inputs = action.arguments.filter(argument => argument.direction === 'in');
  let supplied: ActionArgs;

  if (isScalar(data)) {
    const required = inputs.filter(argument => !isDefaultable(argument.name));
    let target: ActionArgument | undefined;
    if (required.length === 1) {
      target = required[0];
    } else if (required.length > 1) {
      throw new ActionArgumentError(`${action.name} needs ${required.length} arguments, pass data as a mapping.`);
    } else {
      const candidates = inputs.filter(argument => argument.name !== 'InstanceID');
      if (candidates.length !== 1) {
        throw new ActionArgumentError(`${action.name} takes no single argument to bind the value to.`);
      }
      target = candidates[0];
    }
    supplied = { [target.name]: data };
  } else {
    supplied = data;
  }

  const args: ActionArgs = {};
  for (const argument of inputs) {
    const value = supplied[argument.name] ?? DEFAULT_ACTION_DATA[argument.name];
    if (value !== undefined) {
      args[argument.name] = value;
    }
  }
  for (const [name, value] of Object.entries(supplied)) {
    if (!(name in args)) {
      logger.warn(`Argument ${name} is not declared by ${action.name}, sending it anyway`);
      args[name] = value;
    }
  }
  return args;
}

function readAction(node: XmlNode): Action | null {
  const name = childText(node, 'name');
  if (!name) return null;
  const argumentsList: ActionArgument[] = [];
  for (const argument of asArray(childNode(node, 'argumentList')?.argument)) {
    if (!isXmlNode(argument)) continue;
    const argumentName = childText(argument, 'name');
    if (!argumentName) continue;
    argumentsList.push({
      name: argumentName,
      direction: childText(argument, 'direction')?.trim().toLowerCase() === 'out' ? 'out' : 'in',
      relatedStateVariable: childText(argument, 'relatedStateVariable'),
    });
  }
  return { name, arguments: argumentsList };
}

function readStateVariable(node: XmlNode): StateVariable | null {
  const name = childText(node, 'name');
  if (!name) return null;
  const variable: StateVariable = {
    name,
    dataType: childText(node, 'dataType'),
    defaultValue: childText(node, 'defaultValue'),
  };
  const sendEvents = attribute(node, 'sendEvents') ?? childText(node, 'sendEvents');
  if (sendEvents !== undefined) {
    variable.sendEvents = sendEvents.toLowerCase() === 'yes';
  }
  const allowedValues = asArray(childNode(node, 'allowedValueList')?.allowedValue)
    .map(value => (typeof value === 'string' ? value : undefined))
    .filter((value): value is string => value !== undefined);
  if (allowedValues.length > 0) {
    variable.allowedValues = allowedValues;
  }
  const range = childNode(node, 'allowedValueRange');
  if (range) {
    variable.allowedValueRange = {
      minimum: childText(range, 'minimum'),
      maximum: childText(range, 'maximum'),
      step: childText(range, 'step'),
    };
  }
  return variable;
}

/**
 * @hebrew מנתח מסמך SCPD לרשימת פעולות וטבלת משתני מצב.
 */
export async function parseServiceSpec(xml: string): Promise<ServiceSpec> {
  const scpd = await parseXml(stripDefaultNamespace(xml));
  const actions = asArray(childNode(scpd, 'actionList')?.action)
    .filter(isXmlNode)
    .map(readAction)
    .filter((action): action is Action => action !== null);
  const stateVariables = asArray(childNode(scpd, 'serviceStateTable')?.stateVariable)
    .filter(isXmlNode)
    .map(readStateVariable)
    .filter((variable): variable is StateVariable => variable !== null);
  return { actions, stateVariables };
}

/**
 * @hebrew שירות בודד של התקן UPnP: שליפת ה-SCPD ושמירתו, הפעלת פעולות SOAP,
 * ומחזור החיים של מנוי האירועים (SUBSCRIBE וחידושו).
 */
export class UpnpService {
  readonly serviceType: string;
  readonly urn: string;
  readonly controlUrl: string;
  readonly eventUrl: string;
  readonly specUrl: string;

  /** true כל עוד לולאת חידוש המנוי פעילה */
  subscribed = false;
  /** epoch ms, לפניו קריאה ל-subscribe לא שולחת בקשה */
  nextSubscribeCallTime: number | null = null;

  /** מטמון שמות הפעולות, מתמלא ב-getActions */
  readonly actions = new Map<string, Action>();

  private spec: ServiceSpec | null = null;
  private specRequest: Promise<ServiceSpec> | null = null;
  private loopGeneration = 0;
  private loopWake: AbortController | null = null;

  constructor(
    description: ServiceDescription,
    private readonly host: ServiceHost,
    private readonly http: HttpClient = defaultHttpClient,
  ) {
    this.serviceType = description.serviceType;
    this.urn = description.serviceType;
    this.controlUrl = new URL(description.controlURL, host.locationUrl).toString();
    this.eventUrl = new URL(description.eventSubURL, host.locationUrl).toString();
    this.specUrl = new URL(description.SCPDURL, host.locationUrl).toString();
  }

  async getSpec(): Promise<ServiceSpec> {
    if (this.spec) {
      return this.spec;
    }
    if (!this.specRequest) {
      this.specRequest = this.fetchSpec().then(
        spec => {
          this.spec = spec;
          return spec;
        },
        (error: unknown) => {
          this.specRequest = null;
          throw error;
        },
      );
    }
    return this.specRequest;
  }

  private async fetchSpec(): Promise<ServiceSpec> {
    logger.info(`${this.host.name} ${this.serviceType}: fetching spec from ${this.specUrl}`);
    const response = await this.http.get(this.specUrl, { responseType: 'text', timeout: SPEC_FETCH_TIMEOUT_MS });
    if (typeof response.data !== 'string') {
      throw new Error(`SCPD response from ${this.specUrl} is not text`);
    }
    return parseServiceSpec(response.data);
  }

  async getActions(): Promise<Action[]> {
    const spec = await this.getSpec();
    for (const action of spec.actions) {
      this.actions.set(action.name, action);
    }
    return spec.actions;
  }

  async getActionSpec(actionName: string): Promise<Action | null> {
    const cached = this.actions.get(actionName);
    if (cached) {
      return cached;
    }
    const actions = await this.getActions();
    return actions.find(action => action.name === actionName) ?? null;
  }

  async getStateVariables(): Promise<StateVariable[]> {
    const spec = await this.getSpec();
    return spec.stateVariables;
  }

  /**
   * @hebrew מפעיל פעולת SOAP על השירות.
   * @returns ערכי הפלט של הפעולה, או null אם ההתקן החזיר fault או שהבקשה נכשלה.
   * @throws ActionNotFoundError אם לשירות אין פעולה בשם הזה.
   * @throws ActionArgumentError אם הועבר ערך בודד שלא ניתן לקשור.
   */
  async control(actionName: string, data: ActionData = {}): Promise<ActionResult | null> {
    const action = await this.getActionSpec(actionName);
    if (!action) {
      throw new ActionNotFoundError(actionName, this.serviceType);
    }
    const args = buildActionArguments(action, data);
    const outcome = await sendSoapRequest(this.http, this.controlUrl, this.urn, actionName, args);

    switch (outcome.kind) {
      case 'result':
        this.host.recordSuccess();
        return outcome.values;
      case 'fault':
        this.host.recordSuccess();
        logger.error(`${this.host.name} ${actionName}: device returned a fault`, { fault: outcome.fault });
        return null;
      case 'connection-error':
        logger.error(`${this.host.name} ${actionName}: connection error`, { error: outcome.error });
        this.host.recordConnectionFailure(actionName, outcome.error);
        return null;
      case 'error':
        logger.error(`${this.host.name} ${actionName}: control error`, { error: outcome.error });
        return null;
    }
  }

  /**
   * @hebrew שולח SUBSCRIBE לכתובת האירועים של השירות.
   * @returns true בהצלחה, false בכישלון, null אם עוד לא הגיעה חצי התקופה מאז המנוי הקודם.
   */
  async subscribe(timeoutSec: number = DEFAULT_SUBSCRIBE_TIMEOUT_SEC): Promise<boolean | null> {
    const callbackUrl = this.host.eventCallbackUrl();
    if (!callbackUrl) {
      logger.warn(`${this.host.name}: no host ip, event subscription disabled`);
      return false;
    }
    if (this.nextSubscribeCallTime !== null && Date.now() < this.nextSubscribeCallTime) {
      return null;
    }

    logger.info(`Subscribe ${this.host.name} ${this.serviceType}`);
    try {
      const response = await this.http.request({
        method: 'SUBSCRIBE',
        url: this.eventUrl,
        headers: {
          'Cache-Control': 'no-cache',
          NT: 'upnp:event',
          Callback: `<${callbackUrl}>`,
          Timeout: `Second-${timeoutSec}`,
        },
        timeout: SUBSCRIBE_REQUEST_TIMEOUT_MS,
        validateStatus: () => true,
      });
      if (response.status >= 200 && response.status < 300) {
        this.nextSubscribeCallTime = Date.now() + Math.floor(timeoutSec / 2) * 1000;
        logger.info(`${this.host.name} ${this.serviceType} subscribed`);
        return true;
      }
      logger.warn(`${this.host.name} ${this.serviceType}: SUBSCRIBE returned ${response.status}`);
      return false;
    } catch (error) {
      logger.warn(`${this.host.name} ${this.serviceType}: SUBSCRIBE failed`, { error: toError(error) });
      return false;
    }
  }

  /**
   * @hebrew לולאת חידוש מנוי. רצה עד ש-stopSubscribe מאפס את הדגל ומעיר את ההמתנה.
   * בלי כתובת IP לקולבק הלולאה לא מתחילה בכלל.
   */
  async loopSubscribe(timeoutSec: number = DEFAULT_SUBSCRIBE_TIMEOUT_SEC): Promise<void> {
    if (this.subscribed) {
      return;
    }
    if (!this.host.eventCallbackUrl()) {
      logger.warn(`${this.host.name}: no host ip, event subscription disabled`);
      return;
    }
    this.subscribed = true;
    const generation = ++this.loopGeneration;
    const wake = new AbortController();
    this.loopWake = wake;
    const isCurrent = () => this.subscribed && generation === this.loopGeneration;
    try {
      while (isCurrent()) {
        await this.subscribe(timeoutSec);
        if (!isCurrent()) break;
        await delay(Math.floor(timeoutSec / 2) * 1000, wake.signal);
      }
    } finally {
      if (this.loopWake === wake) {
        this.loopWake = null;
      }
    }
  }

  stopSubscribe(): void {
    this.subscribed = false;
    this.loopWake?.abort();
    this.loopWake = null;
  }
}
