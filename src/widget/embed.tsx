/**
 * Embeddable entry point.
 *
 *   <script src="cost-widget.js" data-api-url="http://192.168.0.10:5050"></script>
 *
 * Mounts the floating cost monitor into its own container on the host page.
 */
import { StrictMode } from 'react';
import { createRoot } from 'react-dom/client';
import { CostWidgetApp } from '../ui/CostWidgetApp';
import { DEFAULT_API_BASE } from '../api/client';
import { CostMonitor } from './monitor';
import './widget.css';

// Only readable while the script tag itself is executing
const script = document.currentScript;
const apiBase = script?.getAttribute('data-api-url') || DEFAULT_API_BASE;

function mount(): void {
  const container = document.createElement('div');
  container.id = 'cost-widget-root';
  document.body.appendChild(container);

  const monitor = new CostMonitor({ apiBase });
  createRoot(container).render(
    <StrictMode>
      <CostWidgetApp monitor={monitor} />
    </StrictMode>,
  );
  console.log(`[Widget] Mounted, polling ${apiBase}`);
}

if (document.body) {
  mount();
} else {
  document.addEventListener('DOMContentLoaded', mount, { once: true });
}
