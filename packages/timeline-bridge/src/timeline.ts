import { create } from 'xmlbuilder2';
import type { TimelineParameters } from './adapter';

export const CONTROLLABLE = 'playPause,stop,volume,shuffle,repeat,seekTo,skipPrevious,skipNext,stepBack,stepForward';

/**
 * @hebrew מצב ה-Timeline של התקן, לפני שמכניסים את ה-commandID של המנוי.
 */
export type TimelineSnapshot =
  | { kind: 'stopped' }
  | { kind: 'disconnected' }
  | { kind: 'playing'; parameters: TimelineParameters };

export const STOPPED_SNAPSHOT: TimelineSnapshot = { kind: 'stopped' };
export const DISCONNECTED_SNAPSHOT: TimelineSnapshot = { kind: 'disconnected' };

function toAttributes(parameters: TimelineParameters): Record<string, string> {
  const attributes: Record<string, string> = {};
  for (const [name, value] of Object.entries(parameters)) {
    attributes[name] = String(value);
  }
  return attributes;
}

/**
 * @hebrew בונה את מסמך ה-MediaContainer שנשלח למנוי.
 * Timeline של וידאו ותמונות תמיד במצב stopped.
 */
export function buildTimelineXml(snapshot: TimelineSnapshot, commandId: number): string {
  const container = create().ele('MediaContainer', { commandID: String(commandId) });
  if (snapshot.kind === 'disconnected') {
    container.att('disconnected', '1');
  }
  if (snapshot.kind === 'playing') {
    container.ele('Timeline', {
      controllable: CONTROLLABLE,
      type: 'music',
      ...toAttributes(snapshot.parameters),
    });
  } else {
    container.ele('Timeline', { type: 'music', state: 'stopped' });
  }
  container.ele('Timeline', { type: 'video', state: 'stopped' });
  container.ele('Timeline', { type: 'photo', state: 'stopped' });
  return container.end({ headless: true, prettyPrint: false });
}
