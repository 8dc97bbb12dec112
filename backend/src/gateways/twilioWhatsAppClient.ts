// backend/src/gateways/twilioWhatsAppClient.ts
// WhatsApp template sends through Twilio content templates
import twilio from "twilio";
import type { Logger } from "../logging";
import { errorMessage } from "../logging";
import type { SendResult, WhatsAppGateway, WhatsAppTemplateMessage } from "./types";

export const DRY_RUN_MESSAGE_ID = "DRY_RUN_MESSAGE";

export interface WhatsAppMessageParams {
  from: string;
  to: string;
  contentSid: string;
  contentVariables: string;
}

// The slice of the Twilio client this gateway uses
export interface WhatsAppTransport {
  messages: {
    create(params: WhatsAppMessageParams): Promise<{ sid: string }>;
  };
}

export interface TwilioWhatsAppOptions {
  accountSid: string | null;
  authToken: string | null;
  from: string | null;
  dryRun: boolean;
  transport?: WhatsAppTransport;
}

function whatsappAddress(phone: string): string {
  const trimmed = phone.trim();
  if (trimmed.startsWith("whatsapp:")) return trimmed;
  return `whatsapp:${trimmed.startsWith("+") ? trimmed : `+${trimmed}`}`;
}

export class TwilioWhatsAppClient implements WhatsAppGateway {
  private transport: WhatsAppTransport | null;

  constructor(private readonly options: TwilioWhatsAppOptions, private readonly log: Logger) {
    this.transport = options.transport ?? null;
  }

  // Lazy client: only created on the first live send
  private getTransport(): WhatsAppTransport {
    if (!this.transport) {
      const { accountSid, authToken } = this.options;
      if (!accountSid || !authToken) {
        throw new Error("TWILIO_ACCOUNT_SID or TWILIO_AUTH_TOKEN not set");
      }
      this.transport = twilio(accountSid, authToken);
    }
    return this.transport;
  }

  async sendTemplate(message: WhatsAppTemplateMessage): Promise<SendResult> {
    const contentVariables = JSON.stringify(
      Object.fromEntries(message.params.map((value, index) => [String(index + 1), value]))
    );

    if (this.options.dryRun) {
      this.log.info("WhatsApp dry run", {
        to: message.to,
        template: message.template,
        language: message.language,
        contentVariables,
      });
      return { success: true, id: DRY_RUN_MESSAGE_ID, dryRun: true };
    }

    if (!this.options.from) {
      return { success: false, error: "TWILIO_WHATSAPP_FROM not set" };
    }

    try {
      const result = await this.getTransport().messages.create({
        from: whatsappAddress(this.options.from),
        to: whatsappAddress(message.to),
        contentSid: message.template,
        contentVariables,
      });
      this.log.info("WhatsApp template sent", { to: message.to, sid: result.sid });
      return { success: true, id: result.sid, dryRun: false };
    } catch (error) {
      this.log.error("WhatsApp template send failed", { to: message.to, error: errorMessage(error) });
      return { success: false, error: errorMessage(error) };
    }
  }
}
