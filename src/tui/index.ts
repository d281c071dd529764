import React from 'react';
import { render } from 'ink';
import open from 'open';
import type { AlertConsole } from '../alerts/console.js';
import { AlertsApp } from './AlertsApp.js';

export { AlertsApp } from './AlertsApp.js';
export type { AlertsAppProps } from './AlertsApp.js';
export { extractRunbookUrl, statusColor } from './format.js';

/**
 * Start the console, render the UI and resolve once the user quits.
 */
export async function runTui(alertConsole: AlertConsole): Promise<void> {
  const { waitUntilExit } = render(
    React.createElement(AlertsApp, { alertConsole, openUrl: (url: string) => open(url) }),
  );

  // Failures of the first load surface as notifications inside the UI
  void alertConsole.start();
  try {
    await waitUntilExit();
  } finally {
    alertConsole.stop();
  }
}
