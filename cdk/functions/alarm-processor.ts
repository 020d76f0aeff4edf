// cdk/functions/alarm-processor.ts
import { PutObjectCommand, type PutObjectCommandInput, S3Client } from "@aws-sdk/client-s3";
import { SESClient, SendEmailCommand, type SendEmailCommandInput } from "@aws-sdk/client-ses";
import { z } from "zod";
import {
  compactTimestamp,
  datePartition,
  formatReadingTimestamp,
  parseReadingTimestamp,
  partitionPath,
} from "../lib/partitions";
import { type AlarmConfig, loadAlarmConfig } from "./config";

/**
 * Alarm messages from the IoT rule:
 *   SELECT *, topic(2) AS equipment FROM 'PRO/+/alarm'
 * Payload: { d: { alarm: ["msg"], email: ["a@b"] }, ts: "YYYY-MM-DD HH:MM:SS" }
 */

export interface AuditStore {
  putObject(input: PutObjectCommandInput): Promise<unknown>;
}

export interface Mailer {
  sendEmail(input: SendEmailCommandInput): Promise<{ MessageId?: string }>;
}

export interface AlarmDeps {
  store: AuditStore;
  mailer: Mailer;
  config: AlarmConfig;
  now?: () => Date;
}

export interface AlarmAuditRecord {
  alarm_message: string;
  email_recipients: string[];
  timestamp: string;
  equipment: string;
  processed_at: string;
  email_sent: boolean;
  ses_message_id?: string;
  email_error?: string;
  raw_payload: unknown;
}

export interface AlarmResult {
  status: "processed";
  s3Key: string;
  equipment: string;
  alarmMessage: string;
  recipients: string[];
  emailSent: boolean;
}

export class InvalidAlarmError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidAlarmError";
  }
}

const OneOrMany = z.union([z.string(), z.array(z.string())]).optional();

const AlarmPayload = z
  .object({
    d: z.object({ alarm: OneOrMany, email: OneOrMany }).passthrough().default({}),
    ts: z.string().optional(),
    equipment: z.union([z.string(), z.number()]).optional(),
    topic: z.string().optional(),
  })
  .passthrough();

const list = (v: string | string[] | undefined): string[] =>
  (Array.isArray(v) ? v : v === undefined ? [] : [v]).map((s) => s.trim()).filter(Boolean);

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (c) => HTML_ESCAPES[c] ?? c);
}

interface AlarmMail {
  equipment: string;
  timestamp: string;
  message: string;
  recipients: string[];
  sender: string;
  processedAt: string;
}

export function renderAlarmEmail(m: AlarmMail): { subject: string; text: string; html: string } {
  const rows: [string, string][] = [
    ["Equipment", m.equipment],
    ["Date/time", m.timestamp],
    ["Message", m.message],
  ];
  const text = [
    "BIOREACTOR ALARM",
    "",
    ...rows.map(([k, v]) => `${k}: ${v}`),
    "",
    `Recipients: ${m.recipients.join(", ")}`,
    `Processed: ${m.processedAt} UTC`,
  ].join("\n");
  const html = [
    "<html><body>",
    `<h2 style="color: #d32f2f;">Bioreactor alarm</h2>`,
    `<table style="border-collapse: collapse;">`,
    ...rows.map(
      ([k, v]) =>
        `<tr><td style="border: 1px solid #ddd; padding: 8px; font-weight: bold;">${k}</td>` +
        `<td style="border: 1px solid #ddd; padding: 8px;">${escapeHtml(v)}</td></tr>`
    ),
    "</table>",
    `<p style="color: #666; font-size: 12px;">Recipients: ${escapeHtml(m.recipients.join(", "))}<br>` +
      `Sender: ${escapeHtml(m.sender)}<br>Processed: ${m.processedAt} UTC</p>`,
    "</body></html>",
  ].join("\n");
  return { subject: `Bioreactor alarm ${m.equipment}`, text, html };
}

export function alarmKey(prefix: string, equipment: string, at: Date): string {
  return `${prefix}${partitionPath(datePartition(at))}/equipment=${equipment}/${compactTimestamp(at)}_alarm.json`;
}

export function createHandler(deps: AlarmDeps) {
  const now = deps.now ?? (() => new Date());
  const { config } = deps;

  return async (event: unknown): Promise<AlarmResult> => {
    console.log("processing alarm:", JSON.stringify(event));

    const parsed = AlarmPayload.safeParse(event);
    if (!parsed.success) {
      throw new InvalidAlarmError(parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; "));
    }
    const p = parsed.data;

    const equipment = String(p.equipment ?? p.topic?.split("/")[1] ?? "").trim();
    if (!equipment) throw new InvalidAlarmError("equipment not present in payload or topic");

    const processedAt = now();
    const at = p.ts === undefined ? processedAt : parseReadingTimestamp(p.ts);
    if (!at) throw new InvalidAlarmError(`ts: expected YYYY-MM-DD HH:MM:SS, got ${JSON.stringify(p.ts)}`);

    const message = list(p.d.alarm)[0] ?? "Unknown alarm";
    let recipients = list(p.d.email);
    if (recipients.length === 0) recipients = config.defaultRecipients;

    const audit: AlarmAuditRecord = {
      alarm_message: message,
      email_recipients: recipients,
      timestamp: formatReadingTimestamp(at),
      equipment,
      processed_at: formatReadingTimestamp(processedAt),
      email_sent: false,
      raw_payload: event,
    };

    if (recipients.length === 0) {
      console.warn("no alarm recipients configured, skipping e-mail", equipment);
    } else {
      const mail = renderAlarmEmail({
        equipment,
        timestamp: audit.timestamp,
        message,
        recipients,
        sender: config.sender,
        processedAt: audit.processed_at,
      });
      try {
        const res = await deps.mailer.sendEmail({
          Source: config.sender,
          Destination: { ToAddresses: recipients },
          Message: {
            Subject: { Data: mail.subject },
            Body: { Text: { Data: mail.text }, Html: { Data: mail.html } },
          },
        });
        audit.email_sent = true;
        audit.ses_message_id = res.MessageId;
        console.log("alarm e-mail sent", JSON.stringify({ recipients, messageId: res.MessageId }));
      } catch (err) {
        // the audit record still gets written; the failure is kept in it
        audit.email_error = err instanceof Error ? err.message : String(err);
        console.error("error sending alarm e-mail", audit.email_error);
      }
    }

    const key = alarmKey(config.prefix, equipment, at);
    await deps.store.putObject({
      Bucket: config.bucket,
      Key: key,
      Body: JSON.stringify(audit, null, 2),
      ContentType: "application/json",
    });

    return {
      status: "processed",
      s3Key: key,
      equipment,
      alarmMessage: message,
      recipients,
      emailSent: audit.email_sent,
    };
  };
}

let defaultHandler: ReturnType<typeof createHandler> | undefined;

export const handler = async (event: unknown): Promise<AlarmResult> => {
  if (!defaultHandler) {
    const s3 = new S3Client({});
    const ses = new SESClient({});
    defaultHandler = createHandler({
      store: { putObject: (input) => s3.send(new PutObjectCommand(input)) },
      mailer: { sendEmail: (input) => ses.send(new SendEmailCommand(input)) },
      config: loadAlarmConfig(),
    });
  }
  return defaultHandler(event);
};
