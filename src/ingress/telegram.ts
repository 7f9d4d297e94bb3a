import { z } from 'zod';
import type { InboundMessage, MessageKind } from '../shared/types.js';

// ─── Bot API update (only the fields the field channel reads) ───────────────

const fileSchema = z.object({
  file_id: z.string(),
  file_unique_id: z.string(),
  file_name: z.string().optional(),
  mime_type: z.string().optional(),
});

const photoSizeSchema = fileSchema.extend({
  width: z.number(),
  height: z.number(),
});

const messageSchema = z.object({
  message_id: z.number().int(),
  date: z.number().int(),
  chat: z.object({ id: z.number().int() }),
  from: z.object({ id: z.number().int(), username: z.string().optional() }).optional(),
  text: z.string().optional(),
  caption: z.string().optional(),
  photo: z.array(photoSizeSchema).optional(),
  video: fileSchema.optional(),
  document: fileSchema.optional(),
  location: z
    .object({
      latitude: z.number(),
      longitude: z.number(),
      horizontal_accuracy: z.number().optional(),
    })
    .optional(),
});

export const telegramUpdateSchema = z.object({
  update_id: z.number().int(),
  message: messageSchema.optional(),
});

export type TelegramUpdate = z.infer<typeof telegramUpdateSchema>;
type TelegramMessage = z.infer<typeof messageSchema>;

const TEXT_KINDS: Record<string, MessageKind> = {
  '#find': 'find',
  '#dive': 'dive_log',
  '#divelog': 'dive_log',
  '#location': 'location',
  '#loc': 'location',
};

function hashtag(text: string | undefined): string | undefined {
  return /^\s*(#\w+)/.exec(text ?? '')?.[1]?.toLowerCase();
}

function blobRef(fileId: string): string {
  return `tg://file/${fileId}`;
}

type Classified = Pick<InboundMessage, 'kind' | 'payload' | 'mediaBlobRef'>;

function classify(message: TelegramMessage): Classified | null {
  const caption = message.caption ?? '';

  if (message.location) {
    const { latitude, longitude, horizontal_accuracy } = message.location;
    return {
      kind: 'location',
      payload: {
        lat: latitude,
        lon: longitude,
        ...(horizontal_accuracy !== undefined ? { accuracy: horizontal_accuracy } : {}),
      },
    };
  }

  if (message.photo && message.photo.length > 0) {
    const largest = message.photo.reduce((a, b) => (b.width * b.height > a.width * a.height ? b : a));
    // A photo captioned `#find ...` is a find report with the photo attached.
    const kind = hashtag(caption) === '#find' ? 'find' : 'photo';
    return { kind, payload: caption, mediaBlobRef: blobRef(largest.file_id) };
  }

  if (message.video) {
    return { kind: 'video', payload: caption, mediaBlobRef: blobRef(message.video.file_id) };
  }

  if (message.document) {
    const doc = message.document;
    const tag = hashtag(caption);
    const kind: MessageKind | null =
      tag === '#signature' ? 'signature' : doc.mime_type?.startsWith('image/') ? 'photo' : null;
    if (!kind) return null;
    const extra = [doc.file_name ? `file_name: ${doc.file_name}` : '', doc.mime_type ? `mime_type: ${doc.mime_type}` : '']
      .filter(Boolean)
      .join('\n');
    return {
      kind,
      payload: [caption, extra].filter(Boolean).join('\n'),
      mediaBlobRef: blobRef(doc.file_id),
    };
  }

  const tag = hashtag(message.text);
  const kind = tag ? TEXT_KINDS[tag] : undefined;
  if (kind && message.text) return { kind, payload: message.text };
  return null;
}

/**
 * Maps one webhook update to a field message, or null for updates the field
 * channel does not handle (commands, chatter, edits).
 */
export function toInboundMessage(update: TelegramUpdate): InboundMessage | null {
  const message = update.message;
  if (!message) return null;
  const classified = classify(message);
  if (!classified) return null;

  return {
    ...classified,
    externalUserId: String(message.from?.id ?? message.chat.id),
    externalChatId: String(message.chat.id),
    externalMessageId: String(message.message_id),
    sentAt: new Date(message.date * 1000),
    username: message.from?.username,
  };
}
