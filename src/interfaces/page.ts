/**
 * Dashboard page
 * Renders server status, product catalog and the log tail as one HTML page.
 */

import { resolveServerAddress } from '../core/commands.js';
import type { CommandSet, DashboardView } from '../types/index.js';

export interface PageOptions {
  pollIntervalMs: number;
}

const COMMAND_STEPS: Array<{ field: keyof CommandSet; label: string }> = [
  { field: 'install_key', label: '1. Install license key' },
  { field: 'set_server', label: '2. Set KMS server' },
  { field: 'activate', label: '3. Activate' },
  { field: 'check_status', label: '4. Check status' }
];

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function renderProducts(view: DashboardView): string {
  if (view.catalog.size === 0) {
    return '<p class="muted">No products available.</p>';
  }

  let index = 0;
  const cards: string[] = [];
  for (const entry of view.catalog.values()) {
    index++;
    const name = escapeHtml(entry.display_name);
    const steps = COMMAND_STEPS.map(({ field, label }) => {
      const command = escapeHtml(entry.commands[field]);
      return `
          <div class="command-box">
            <p><strong>${label}</strong></p>
            <code class="command-text">${command}</code>
            <button class="copy" data-copy="${command}">Copy</button>
            <button class="run" data-command="${command}" data-product="${name}">Record</button>
          </div>`;
    }).join('');

    cards.push(`
      <div class="product-card" id="product-${index}">
        <div class="product-header" data-toggle="commands-${index}">
          <h3>${name}</h3>
          <span class="license-key">${escapeHtml(entry.license_key)}</span>
          <button class="copy" data-copy="${escapeHtml(entry.license_key)}">Copy key</button>
        </div>
        <div class="commands" id="commands-${index}" hidden>${steps}
        </div>
      </div>`);
  }
  return cards.join('');
}

function renderLogs(logs: string[]): string {
  return logs.map(line => `<div>${escapeHtml(line.trim())}</div>`).join('\n');
}

export function renderDashboard(view: DashboardView, options: PageOptions): string {
  const { config } = view;
  const address = escapeHtml(resolveServerAddress(config));

  return /* html */ `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8" />
  <meta name="viewport" content="width=device-width, initial-scale=1.0" />
  <title>KMS Console</title>
  <style>
    body { font-family: system-ui, sans-serif; margin: 0; background: #f5f6f8; color: #1f2937; }
    main { max-width: 960px; margin: 0 auto; padding: 2rem 1rem; }
    section { background: #fff; border-radius: 6px; padding: 1rem 1.25rem; margin-bottom: 1.25rem; box-shadow: 0 1px 3px rgba(0,0,0,0.08); }
    .status { display: inline-block; padding: 0.1rem 0.5rem; border-radius: 4px; font-size: 0.85rem; text-transform: capitalize; }
    .status-running { background: #dcfce7; color: #166534; }
    .status-stopped { background: #fee2e2; color: #991b1b; }
    .status-unknown { background: #e5e7eb; color: #374151; }
    .product-card { border: 1px solid #e5e7eb; border-radius: 4px; margin: 0.75rem 0; }
    .product-header { padding: 0.75rem; cursor: pointer; display: flex; gap: 0.75rem; align-items: center; flex-wrap: wrap; }
    .product-header h3 { margin: 0; font-size: 1rem; flex: 1; }
    .license-key, .command-text { font-family: ui-monospace, monospace; background: #f3f4f6; padding: 0.2rem 0.4rem; border-radius: 3px; word-break: break-all; }
    .commands { padding: 0 0.75rem 0.75rem; }
    .command-box { margin: 0.5rem 0; }
    .log-container { background: #000; color: #00ff00; padding: 1rem; height: 300px; overflow-y: scroll; font-family: ui-monospace, monospace; font-size: 0.85rem; }
    .muted { color: #6b7280; }
  </style>
</head>
<body>
  <main>
    <h1>KMS Console</h1>

    <section>
      <h2>Server Status</h2>
      <p><strong>Address:</strong> <span id="server-address">${address}</span></p>
      <p><strong>Status:</strong> <span class="status status-${escapeHtml(config.status)}">${escapeHtml(config.status)}</span></p>
      <form id="config-form">
        <input id="server-ip" placeholder="Server IP" value="${escapeHtml(config.bind_address)}" />
        <input id="server-port" placeholder="Port" value="${escapeHtml(config.port)}" />
        <button type="submit">Update</button>
      </form>
    </section>

    <section>
      <h2>Products (${view.catalog.size} available)</h2>
      <p class="muted">Click a product to show its activation commands.</p>
      ${renderProducts(view)}
    </section>

    <section>
      <h2>Live Server Logs</h2>
      <div class="log-container" id="log-container">
${renderLogs(view.logs)}
      </div>
      <button id="refresh-logs">Refresh Logs</button>
      <button id="toggle-refresh">Toggle Auto-Refresh</button>
    </section>
  </main>

  <script>
    const POLL_INTERVAL_MS = ${Math.max(250, Math.floor(options.pollIntervalMs))};
    let refreshTimer = null;

    function escapeText(text) {
      const div = document.createElement('div');
      div.textContent = text;
      return div.innerHTML;
    }

    async function refreshLogs() {
      try {
        const response = await fetch('/api/logs');
        const lines = await response.json();
        const container = document.getElementById('log-container');
        container.innerHTML = lines.map(line => '<div>' + escapeText(line.trim()) + '</div>').join('');
        container.scrollTop = container.scrollHeight;
      } catch (error) {
        console.error('Error refreshing logs:', error);
      }
    }

    document.getElementById('refresh-logs').addEventListener('click', refreshLogs);
    document.getElementById('toggle-refresh').addEventListener('click', () => {
      if (refreshTimer) {
        clearInterval(refreshTimer);
        refreshTimer = null;
      } else {
        refreshTimer = setInterval(refreshLogs, POLL_INTERVAL_MS);
      }
    });

    document.getElementById('config-form').addEventListener('submit', async (event) => {
      event.preventDefault();
      const ip = document.getElementById('server-ip').value;
      const port = document.getElementById('server-port').value;
      try {
        await fetch('/api/server/config', {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify({ ip, port })
        });
        location.reload();
      } catch (error) {
        alert('Error updating config: ' + error);
      }
    });

    document.querySelectorAll('[data-toggle]').forEach(header => {
      header.addEventListener('click', () => {
        const section = document.getElementById(header.dataset.toggle);
        section.hidden = !section.hidden;
      });
    });

    document.querySelectorAll('button.copy').forEach(button => {
      button.addEventListener('click', async (event) => {
        event.stopPropagation();
        const label = button.textContent;
        await navigator.clipboard.writeText(button.dataset.copy);
        button.textContent = 'Copied';
        setTimeout(() => { button.textContent = label; }, 2000);
      });
    });

    document.querySelectorAll('button.run').forEach(button => {
      button.addEventListener('click', async () => {
        const response = await fetch('/api/execute_command', {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify({ command: button.dataset.command, product: button.dataset.product })
        });
        const data = await response.json();
        alert(data.success ? 'Recorded: ' + data.result : 'Error: ' + data.error);
        refreshLogs();
      });
    });

    setTimeout(refreshLogs, 1000);
  </script>
</body>
</html>`;
}
