import type { AlertEvent, AlertSink } from "../alerts/types.js";
import { describeError } from "../logging/logger.js";

interface DiscordEmbed {
  title: string;
  description: string;
  color: number;
  fields?: { name: string; value: string; inline?: boolean }[];
  timestamp?: string;
  footer?: { text: string };
}

interface DiscordMessage {
  content?: string;
  embeds?: DiscordEmbed[];
}

const WEBHOOK_PREFIXES = [
  "https://discord.com/api/webhooks/",
  "https://discordapp.com/api/webhooks/",
];

const REQUEST_TIMEOUT_MS = 5000;

export function isDiscordWebhook(url: string): boolean {
  return WEBHOOK_PREFIXES.some((prefix) => url.startsWith(prefix));
}

export class DiscordNotifier implements AlertSink {
  private webhookUrl: string;
  private enabled: boolean;

  constructor(webhookUrl: string, enabled: boolean = true) {
    const isValidWebhook = isDiscordWebhook(webhookUrl);
    this.webhookUrl = isValidWebhook ? webhookUrl : "";
    this.enabled = enabled && isValidWebhook;

    if (enabled && !isValidWebhook) {
      if (webhookUrl) {
        console.warn("[Discord] Invalid webhook URL, notifications disabled");
      } else {
        console.log("[Discord] Webhook URL not configured, notifications disabled");
      }
    }
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  buildMessage(event: AlertEvent): DiscordMessage {
    const fields: { name: string; value: string; inline?: boolean }[] = [
      { name: "Sensor", value: event.sensorId, inline: true },
      { name: "Current Value", value: String(event.value), inline: true },
    ];
    if (event.threshold !== null) {
      fields.push({ name: "Threshold", value: String(event.threshold), inline: true });
    }

    const embed: DiscordEmbed = {
      title: `🚨 ${event.displayName}`,
      description:
        event.threshold !== null
          ? `${event.displayName} is ${event.value}, above ${event.threshold}`
          : `${event.displayName} is active`,
      color: event.threshold !== null ? 0xffa500 : 0xff0000,
      fields,
      timestamp: new Date(event.timestamp).toISOString(),
    };

    return { embeds: [embed] };
  }

  notify(event: AlertEvent): void {
    if (!this.enabled) return;
    void this.send(this.buildMessage(event));
  }

  /** Resolves to whether Discord accepted the message. Never rejects. */
  async send(message: DiscordMessage): Promise<boolean> {
    if (!this.webhookUrl) return false;

    try {
      const response = await fetch(this.webhookUrl, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(message),
        signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
      });

      if (!response.ok) {
        console.error(`[Discord] Failed to send message: ${response.status} ${response.statusText}`);
        return false;
      }

      console.log("[Discord] Notification sent successfully");
      return true;
    } catch (error) {
      console.error(`[Discord] Error sending notification: ${describeError(error)}`);
      return false;
    }
  }
}
