import type { ScanRow } from "../types.js";

export type ReportOptions = {
  date: string;
  generatedAt: Date;
  timeZone: string;
  currency: string;
};

export type Report = {
  subject: string;
  html: string;
  text: string;
};

export const NO_SIGNALS_MESSAGE = "No bullish RSI divergences detected today.";

const EXPLAINER =
  "RSI Bullish Divergence occurs when the stock price makes a lower low, but the RSI makes a higher low. " +
  "This suggests that selling pressure is weakening and a potential upward price movement may follow.";

const DISCLAIMER =
  "This is an automated technical analysis alert. Please do your own research before making any investment decisions.";

export function escapeHtml(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

export function formatVolume(volume: number): string {
  return `${(volume / 1000).toFixed(1)}k`;
}

/** Chart link for NSE (.NS) and BSE (.BO) tickers; null for anything else. */
export function tradingViewLink(symbol: string): string | null {
  let exchange: string;
  if (symbol.endsWith(".NS")) exchange = "NSE";
  else if (symbol.endsWith(".BO")) exchange = "BSE";
  else return null;
  const base = symbol.split(".")[0];
  return `https://www.tradingview.com/chart/?symbol=${exchange}:${encodeURIComponent(base)}`;
}

function formatTimestamp(at: Date, timeZone: string): string {
  return at.toLocaleString("en-US", {
    timeZone,
    weekday: "long", year: "numeric", month: "long", day: "2-digit",
    hour: "2-digit", minute: "2-digit"
  });
}

function plural(n: number): string {
  return n === 1 ? "" : "s";
}

function htmlRow(r: ScanRow, currency: string): string {
  const label = escapeHtml(r.symbol.split(".")[0]);
  const link = tradingViewLink(r.symbol);
  const symbolCell = link ? `<a href="${escapeHtml(link)}" target="_blank">${label}</a>` : label;
  const cur = escapeHtml(currency);
  return [
    "<tr>",
    `<td class="symbol">${symbolCell}</td>`,
    `<td class="rsi">${r.rsi}</td>`,
    `<td class="price">${cur}${r.close}</td>`,
    `<td class="price">${cur}${r.low}</td>`,
    `<td class="price">${cur}${r.high}</td>`,
    `<td class="volume">${formatVolume(r.volume)}</td>`,
    "</tr>"
  ].join("");
}

function buildHtml(rows: readonly ScanRow[], stamp: string, currency: string): string {
  return `<html>
<head>
<style>
  body { font-family: 'Segoe UI', Tahoma, sans-serif; background: #29323c; padding: 20px; }
  .container { max-width: 700px; margin: 0 auto; background: #fff; border-radius: 16px; overflow: hidden; }
  .header { background: #237A57; color: #fff; padding: 20px 30px; text-align: center; }
  .content { padding: 30px; }
  table { width: 100%; border-collapse: collapse; }
  th { background: #093637; color: #fff; padding: 12px; text-align: left; font-size: 13px; text-transform: uppercase; }
  td { padding: 12px; border-bottom: 1px solid #f1f5f9; font-size: 14px; }
  .symbol a { color: #093637; font-weight: 700; text-decoration: none; }
  .price { color: #27ae60; }
  .volume { color: #3498db; }
  .footer { background: #f8fdfc; padding: 24px 30px; color: #2c3e50; font-size: 14px; }
</style>
</head>
<body>
<div class="container">
  <div class="header">
    <h2>Bullish Divergence Alert</h2>
    <p>${escapeHtml(stamp)}</p>
  </div>
  <div class="content">
    <p><strong>${rows.length}</strong> bullish RSI divergence signal${plural(rows.length)} detected today.</p>
    <table>
      <thead><tr><th>Symbol</th><th>RSI</th><th>Close</th><th>Low</th><th>High</th><th>Volume</th></tr></thead>
      <tbody>
${rows.map(r => "        " + htmlRow(r, currency)).join("\n")}
      </tbody>
    </table>
  </div>
  <div class="footer">
    <p>${EXPLAINER}</p>
    <p>${DISCLAIMER}</p>
  </div>
</div>
</body>
</html>`;
}

function buildText(rows: readonly ScanRow[], stamp: string, currency: string): string {
  const lines = [
    "BULLISH RSI DIVERGENCE ALERT",
    stamp,
    "",
    `Detected ${rows.length} bullish RSI divergence signal${plural(rows.length)}`,
    ""
  ];
  rows.forEach((r, i) => {
    lines.push(
      `${i + 1}. ${r.symbol}`,
      `   RSI: ${r.rsi}`,
      `   Close: ${currency}${r.close}`,
      `   Low: ${currency}${r.low}`,
      `   High: ${currency}${r.high}`,
      `   Volume: ${formatVolume(r.volume)}`,
      ""
    );
  });
  lines.push(EXPLAINER, "", DISCLAIMER);
  return lines.join("\n");
}

export function buildReport(rows: readonly ScanRow[], opt: ReportOptions): Report {
  const subject = `RSI Divergence Alert - ${rows.length} Signal(s) - ${opt.date}`;
  if (rows.length === 0) {
    return { subject, html: NO_SIGNALS_MESSAGE, text: NO_SIGNALS_MESSAGE };
  }
  const stamp = formatTimestamp(opt.generatedAt, opt.timeZone);
  return {
    subject,
    html: buildHtml(rows, stamp, opt.currency),
    text: buildText(rows, stamp, opt.currency)
  };
}

/** Short one-line-per-signal summary for chat notifications. */
export function buildSummary(rows: readonly ScanRow[], date: string, currency: string): string {
  if (rows.length === 0) return NO_SIGNALS_MESSAGE;
  const lines = rows.map(r => `${r.symbol}: RSI ${r.rsi}, Close ${currency}${r.close}, Low ${currency}${r.low}`);
  return [`Bullish RSI divergence ${date} (${rows.length})`, ...lines].join("\n");
}
