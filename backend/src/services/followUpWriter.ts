import OpenAI from "openai";
import type { Logger } from "../logging";
import { errorMessage } from "../logging";

export interface FollowUpInput {
  firstName: string;
  summary: string;
  qualification: string | null;
}

export interface ReplyInput {
  firstName: string;
  subject: string;
  inbound: string;
  history: string[];
}

export interface FollowUpEmail {
  body: string;
  generated: boolean;
}

export interface ChatMessage {
  role: "system" | "user";
  content: string;
}

// Returns the model's text, or null when there is none
export type ChatCompleter = (messages: ChatMessage[]) => Promise<string | null>;

const SYSTEM_PROMPT = `You write short follow-up emails for an admissions and relocation advisory team.

Write warmly and concisely. Never promise anything the summary does not support.`;

const USER_PROMPT_TEMPLATE = `Context:
Lead First Name: {{firstName}}
Qualification: {{qualification}}
Call Summary:
{{summary}}

Task:
Write the plain-text body of a follow-up email thanking the lead for the call and confirming next steps.

Rules:
- 3 to 6 sentences
- Greet the lead by first name
- No subject line, no signature placeholders
- Output the email body only`;

const REPLY_PROMPT_TEMPLATE = `Context:
Lead First Name: {{firstName}}
Recent conversation, oldest first:
{{history}}

The lead just wrote, under the subject "{{subject}}":
{{inbound}}

Task:
Write the plain-text body of a reply that answers the lead and asks, in one message, for any details still missing.

Rules:
- 4 to 8 short lines
- Greet the lead by first name
- Output the email body only`;

export function followUpPrompt(input: FollowUpInput): string {
  return USER_PROMPT_TEMPLATE.replace("{{firstName}}", () => input.firstName)
    .replace("{{qualification}}", () => input.qualification ?? "unknown")
    .replace("{{summary}}", () => input.summary || "(no summary)");
}

export function replyPrompt(input: ReplyInput): string {
  return REPLY_PROMPT_TEMPLATE.replace("{{firstName}}", () => input.firstName)
    .replace("{{history}}", () => (input.history.length > 0 ? input.history.join("\n") : "(none)"))
    .replace("{{subject}}", () => input.subject)
    .replace("{{inbound}}", () => input.inbound.trim() || "(empty message)");
}

export function fallbackReplyBody({ firstName }: Pick<ReplyInput, "firstName">): string {
  return `Hi ${firstName},\n\nThanks for your message! Could you share your destination, intake month and budget so we can help with the next steps?\n\nThanks!`;
}

export function fallbackFollowUpBody({ firstName, summary }: FollowUpInput): string {
  const recap = summary.trim() ? `\n\nHere's a quick recap of what we discussed:\n${summary.trim()}` : "";
  return `Hi ${firstName},\n\nThanks for taking the time to speak with us today.${recap}\n\nReply to this email if you have any questions.\n\nThanks!`;
}

export function openAiCompleter(apiKey: string, model: string): ChatCompleter {
  const openai = new OpenAI({ apiKey });
  return async (messages) => {
    const completion = await openai.chat.completions.create({
      model,
      messages,
      max_tokens: 400,
      temperature: 0.4,
    });
    return completion.choices[0]?.message?.content ?? null;
  };
}

/**
 * Write follow-up and reply email bodies. Never throws; falls back to a fixed template.
 */
export class FollowUpWriter {
  constructor(private readonly complete: ChatCompleter | null, private readonly log: Logger) {}

  write(input: FollowUpInput): Promise<FollowUpEmail> {
    return this.generate(followUpPrompt(input), fallbackFollowUpBody(input));
  }

  /** Reply to an inbound email from the lead. */
  writeReply(input: ReplyInput): Promise<FollowUpEmail> {
    return this.generate(replyPrompt(input), fallbackReplyBody(input));
  }

  private async generate(prompt: string, fallbackBody: string): Promise<FollowUpEmail> {
    const fallback = { body: fallbackBody, generated: false };
    if (!this.complete) {
      return fallback;
    }

    try {
      const content = await this.complete([
        { role: "system", content: SYSTEM_PROMPT },
        { role: "user", content: prompt },
      ]);

      const body = content?.trim();
      if (!body) {
        return fallback;
      }
      return { body, generated: true };
    } catch (error) {
      this.log.error("Follow-up generation failed", { error: errorMessage(error) });
      return fallback;
    }
  }
}
