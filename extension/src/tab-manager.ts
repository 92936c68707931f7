// Finds video-call tabs and relays bridge events to their content scripts

import type { BridgeEvent } from './bridge-client';

export const CALL_TAB_PATTERNS = ['*://meet.google.com/*'];

export interface BridgeTabMessage {
  action: 'bridge-event';
  event: BridgeEvent['event'];
  correlationId?: string;
}

// The slice of chrome.tabs the relay needs
export interface TabsApi {
  query(queryInfo: { url: string[] }): Promise<Array<{ id?: number }>>;
  sendMessage(tabId: number, message: BridgeTabMessage): Promise<unknown>;
}

function readMuted(reply: unknown): boolean | null {
  if (typeof reply === 'object' && reply !== null && 'muted' in reply && typeof reply.muted === 'boolean') {
    return reply.muted;
  }
  return null;
}

export class TabManager {
  constructor(private readonly tabs: TabsApi, private readonly patterns: string[] = CALL_TAB_PATTERNS) {}

  async findCallTabs(): Promise<number[]> {
    const tabs = await this.tabs.query({ url: this.patterns });
    return tabs.flatMap(tab => (tab.id === undefined ? [] : [tab.id]));
  }

  // Sends the event to every call tab; the first tab that answers with its mic state wins
  async relay(event: BridgeEvent): Promise<{ muted: boolean } | null> {
    const tabIds = await this.findCallTabs();
    if (tabIds.length === 0) {
      console.log('No call tabs open, ignoring bridge event');
      return null;
    }

    const message: BridgeTabMessage = {
      action: 'bridge-event',
      event: event.event,
      correlationId: event.correlationId
    };

    let muted: boolean | null = null;
    for (const tabId of tabIds) {
      try {
        const reply = await this.tabs.sendMessage(tabId, message);
        const state = readMuted(reply);
        if (muted === null && state !== null) {
          muted = state;
        }
      } catch (error) {
        console.error(`Failed to send bridge event to tab ${tabId}:`, error);
      }
    }

    return muted === null ? null : { muted };
  }
}
