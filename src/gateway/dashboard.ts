import { escapeHtml } from '../signals/message.js';
import type { HistoryRow, StatsSnapshot } from '../signals/types.js';

function statCard(label: string, value: string): string {
  return `<div class="card"><div class="label">${escapeHtml(label)}</div><div class="value">${escapeHtml(value)}</div></div>`;
}

function signalRow(row: HistoryRow): string {
  const side = row.action.toLowerCase().includes('buy') ? 'buy' : 'sell';
  const cells = [
    row.date ?? '',
    row.time ?? '',
    row.ticker,
    row.action,
    row.price,
    row.tp1,
    row.tp2,
    row.tp3,
    row.sl,
    row.status ?? row.result ?? '',
  ];
  return `<tr class="${side}">${cells.map((cell) => `<td>${escapeHtml(cell)}</td>`).join('')}</tr>`;
}

export function renderDashboard(stats: StatsSnapshot, signals: readonly HistoryRow[]): string {
  const rows =
    signals.length > 0
      ? signals.map(signalRow).join('\n')
      : '<tr><td colspan="10" class="empty">No signals yet</td></tr>';

  return `<!doctype html>
<html lang="en">
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width, initial-scale=1">
<title>Signal Dashboard</title>
<style>
body { font-family: system-ui, sans-serif; background: #0f172a; color: #e2e8f0; margin: 2rem; }
.cards { display: flex; gap: 1rem; flex-wrap: wrap; margin-bottom: 2rem; }
.card { background: #1e293b; padding: 1rem 1.5rem; border-radius: 8px; min-width: 120px; }
.label { font-size: 0.8rem; color: #94a3b8; }
.value { font-size: 1.6rem; font-weight: 600; }
table { width: 100%; border-collapse: collapse; }
th, td { padding: 0.4rem 0.6rem; border-bottom: 1px solid #334155; text-align: left; }
tr.buy td:nth-child(4) { color: #22c55e; }
tr.sell td:nth-child(4) { color: #ef4444; }
.empty { text-align: center; color: #64748b; }
</style>
</head>
<body>
<h1>Signal Dashboard</h1>
<div class="cards">
${statCard('Total Trades', String(stats.total_trades))}
${statCard('Today', String(stats.today_trades))}
${statCard('Wins', String(stats.wins))}
${statCard('Losses', String(stats.losses))}
${statCard('Win Rate', `${stats.win_rate.toFixed(2)}%`)}
</div>
<table>
<thead><tr><th>Date</th><th>Time</th><th>Ticker</th><th>Action</th><th>Price</th><th>TP1</th><th>TP2</th><th>TP3</th><th>SL</th><th>Status</th></tr></thead>
<tbody>
${rows}
</tbody>
</table>
</body>
</html>
`;
}
