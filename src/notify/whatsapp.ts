import axios from "axios";
import logger from "../logger.js";

export const CALLMEBOT_URL = "https://api.callmebot.com/whatsapp.php";

export type WhatsAppConfig = {
  phone: string;
  apiKey: string;
};

export type HttpGetter = {
  get(url: string, config: { params: Record<string, string>; timeout: number; validateStatus: () => boolean }): Promise<{ status: number; data: unknown }>;
};

/**
 * Sends `message` through CallMeBot. Resolves false (and logs) instead of
 * throwing, so a failed notification never fails the scan.
 */
export async function sendWhatsAppMessage(
  message: string,
  config: WhatsAppConfig,
  client: HttpGetter = axios
): Promise<boolean> {
  if (!config.phone || !config.apiKey) {
    logger.warn("WhatsApp credentials not configured, skipping notification");
    return false;
  }
  try {
    const res = await client.get(CALLMEBOT_URL, {
      params: { phone: config.phone, text: message, apikey: config.apiKey },
      timeout: 15_000,
      validateStatus: () => true
    });
    if (res.status === 200) {
      logger.info("WhatsApp message sent");
      return true;
    }
    logger.error({ status: res.status, body: String(res.data) }, "WhatsApp message rejected");
    return false;
  } catch (err) {
    logger.error({ err }, "WhatsApp message failed");
    return false;
  }
}
