// Service worker for the mic-remote extension
// Keeps the bridge poll alive and relays toggles between the host and call tabs

import { BridgeClient } from './bridge-client';
import { TabManager } from './tab-manager';

const KEEP_ALIVE_ALARM = 'mic-remote-keep-alive';

interface ReportStateMessage {
  action: 'report-state';
  muted: boolean;
  correlationId?: string;
}

interface StatusRequestMessage {
  action: 'getConnectionStatus';
}

function isReportState(message: unknown): message is ReportStateMessage {
  return typeof message === 'object' && message !== null
    && 'action' in message && message.action === 'report-state'
    && 'muted' in message && typeof message.muted === 'boolean';
}

function isStatusRequest(message: unknown): message is StatusRequestMessage {
  return typeof message === 'object' && message !== null
    && 'action' in message && message.action === 'getConnectionStatus';
}

const tabManager = new TabManager({
  query: (queryInfo) => chrome.tabs.query(queryInfo),
  sendMessage: (tabId, message) => chrome.tabs.sendMessage(tabId, message)
});

const bridge = new BridgeClient({
  onEvent: (event) => tabManager.relay(event)
});

bridge.onStatusChange((status) => {
  chrome.runtime.sendMessage({ action: 'connectionStatusChanged', status }).catch(() => {
    // Popup might not be open
  });
});

function startService(): void {
  Promise.resolve(chrome.alarms.create(KEEP_ALIVE_ALARM, { periodInMinutes: 0.5 })).catch((error: unknown) => {
    console.error('Failed to schedule keep-alive alarm:', error);
  });
  bridge.start();
}

chrome.runtime.onStartup.addListener(startService);
chrome.runtime.onInstalled.addListener(startService);

// Waking the worker restarts the poll loop if it was torn down
chrome.alarms.onAlarm.addListener((alarm) => {
  if (alarm.name === KEEP_ALIVE_ALARM && !bridge.isRunning) {
    bridge.start();
  }
});

chrome.runtime.onMessage.addListener((message: unknown, _sender, sendResponse) => {
  if (isReportState(message)) {
    bridge.reportState(message.muted, message.correlationId)
      .then(reply => sendResponse({ success: true, status: reply.status }))
      .catch((error: unknown) => {
        console.warn('Failed to report mic state to host:', error);
        sendResponse({ success: false, error: error instanceof Error ? error.message : String(error) });
      });
    return true;
  }

  if (isStatusRequest(message)) {
    sendResponse(bridge.getConnectionStatus());
  }
  return false;
});

startService();
