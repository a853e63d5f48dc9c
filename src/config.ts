import "dotenv/config";

function envNumber(name: string, fallback: number, min = 1): number {
  const raw = Number(process.env[name]);
  return Number.isFinite(raw) ? Math.max(min, Math.floor(raw)) : fallback;
}

export const DEFAULTS = {
  // Indicator
  rsiPeriod: 14,

  // Pivots / divergence
  pivotLookback: 5,

  // Forward-return projection
  horizon: 5,
  useNextOpen: false,

  // Data
  lookbackDays: 365,
  interval: "1d" as const,
  timeZone: process.env.MARKET_TIMEZONE || "Asia/Kolkata",
  fetchTimeoutMs: envNumber("FETCH_TIMEOUT_MS", 30_000, 1_000),

  // Rate limiting
  concurrency: envNumber("SCAN_CONCURRENCY", 5),

  // Report
  currency: "₹"
};

export const NOTIFY = {
  whatsappPhone: String(process.env.WHATSAPP_PHONE || "").trim(),
  whatsappApiKey: String(process.env.WHATSAPP_API_KEY || "").trim()
};

export const EMAIL = {
  host: process.env.SMTP_HOST || "smtp.gmail.com",
  port: envNumber("SMTP_PORT", 587),
  sender: String(process.env.SENDER_EMAIL || "").trim(),
  password: String(process.env.EMAIL_PASSWORD || ""),
  recipient: String(process.env.RECIPIENT_EMAIL || "").trim()
};

export const LOG_LEVEL = process.env.LOG_LEVEL || "info";
