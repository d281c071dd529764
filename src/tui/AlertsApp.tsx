/**
 * AlertsApp - Root TUI component.
 *
 * Renders the alert table from console snapshots and forwards key presses to
 * the console's triggers. Phase-driven: the table, or the detail modal on top
 * of it.
 */

import React, { useState, useEffect, useCallback, useMemo } from 'react';
import { Box, useApp, useInput } from 'ink';
import type { AlertConsole } from '../alerts/console.js';
import type { AlertDescription } from '../alerts/types.js';
import { AlertTable } from './components/AlertTable.js';
import { DescriptionModal } from './components/DescriptionModal.js';
import { Header } from './components/Header.js';
import { type Notice, StatusLine } from './components/StatusLine.js';
import { extractRunbookUrl } from './format.js';

const CLOCK_TICK_MS = 1000;

export interface AlertsAppProps {
  alertConsole: AlertConsole;
  openUrl: (url: string) => Promise<unknown>;
}

export function AlertsApp({ alertConsole, openUrl }: AlertsAppProps) {
  const { exit } = useApp();
  const [version, setVersion] = useState(0);
  const [clock, setClock] = useState(() => new Date());
  const [cursor, setCursor] = useState(0);
  const [notice, setNotice] = useState<Notice | null>(null);
  const [details, setDetails] = useState<AlertDescription | null>(null);
  const [refreshing, setRefreshing] = useState(false);

  // Store changes and notifications arrive over the event bus
  useEffect(() => {
    const bus = alertConsole.eventBus;
    const unsubscribers = [
      bus.on('alerts:changed', () => setVersion((v) => v + 1)),
      bus.on('mutation:pending', () => setVersion((v) => v + 1)),
      bus.on('mutation:confirmed', () => setVersion((v) => v + 1)),
      bus.on('notify', ({ level, message }) => setNotice({ level, message })),
    ];
    return () => unsubscribers.forEach((unsubscribe) => unsubscribe());
  }, [alertConsole]);

  useEffect(() => {
    const interval = setInterval(() => setClock(new Date()), CLOCK_TICK_MS);
    return () => clearInterval(interval);
  }, []);

  // version is the change counter that invalidates the snapshot
  const rows = useMemo(() => alertConsole.currentView(clock), [alertConsole, clock, version]);
  const pendingIds = useMemo(
    () => new Set(alertConsole.pendingActions().keys()),
    [alertConsole, version],
  );
  const runbookUrl = useMemo(
    () => (details ? extractRunbookUrl(details.description) : null),
    [details],
  );

  useEffect(() => {
    setCursor((current) => Math.min(current, Math.max(rows.length - 1, 0)));
  }, [rows.length]);

  const refresh = useCallback(async () => {
    setRefreshing(true);
    await alertConsole.triggerRefresh();
    setRefreshing(false);
  }, [alertConsole]);

  const view = useCallback(async () => {
    const alertId = alertConsole.selectAt(cursor);
    if (alertId === undefined) return;

    const outcome = await alertConsole.requestDetail(alertId);
    if (outcome.ok) {
      setDetails(outcome.description);
    }
  }, [alertConsole, cursor]);

  const openRunbook = useCallback(async () => {
    if (!runbookUrl) return;
    try {
      await openUrl(runbookUrl);
    } catch (error) {
      setNotice({
        level: 'error',
        message: `Could not open ${runbookUrl}: ${error instanceof Error ? error.message : String(error)}`,
      });
    }
  }, [openUrl, runbookUrl]);

  useInput((input, key) => {
    if (details) {
      if (key.escape || input === 'q' || input === 'd' || input === 'v') {
        setDetails(null);
      } else if (input === 'o') {
        void openRunbook();
      }
      return;
    }

    if (input === 'q') {
      exit();
    } else if (key.upArrow || input === 'k') {
      setCursor((current) => Math.max(current - 1, 0));
    } else if (key.downArrow || input === 'j') {
      setCursor((current) => Math.min(current + 1, Math.max(rows.length - 1, 0)));
    } else if (input === 'r') {
      void refresh();
    } else if (input === 'a') {
      const alertId = alertConsole.selectAt(cursor);
      if (alertId !== undefined) void alertConsole.triggerAcknowledge(alertId);
    } else if (input === 'c') {
      const alertId = alertConsole.selectAt(cursor);
      if (alertId !== undefined) void alertConsole.triggerClose(alertId);
    } else if (input === 'v' || key.return) {
      void view();
    }
  });

  return (
    <Box flexDirection="column">
      <Header openCount={rows.length} clock={clock} refreshing={refreshing} />
      {details ? (
        <DescriptionModal details={details} runbookUrl={runbookUrl} />
      ) : (
        <AlertTable rows={rows} cursor={cursor} pendingIds={pendingIds} />
      )}
      <StatusLine notice={notice} />
    </Box>
  );
}
