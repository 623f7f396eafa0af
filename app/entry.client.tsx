import * as Sentry from '@sentry/react';
import { StrictMode } from 'react';
import { createRoot } from 'react-dom/client';
import { getEnvironment, getSentryDsn } from './environment';
import { App } from './root';
import './tailwind.css';

const sentryDsn = getSentryDsn();
const environment = getEnvironment();

Sentry.init({
  dsn: sentryDsn ?? undefined,
  sendDefaultPii: false,
  enabled: sentryDsn !== null && environment !== 'local',
  environment,
  enableLogs: true,
  normalizeDepth: 5,
  integrations: [Sentry.consoleLoggingIntegration()],
});

const container = document.getElementById('root');
if (!container) {
  throw new Error('Root element #root is missing from index.html');
}

createRoot(container).render(
  <StrictMode>
    <App />
  </StrictMode>,
);
