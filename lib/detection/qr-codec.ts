/**
 * QR image sources and decoded-content classification
 *
 * Decoding itself is delegated to a QRCodec; this module finds candidate
 * images in an email and labels what a decoded payload looks like.
 */

import type { EmailRecord, QrContentType } from './types';

export interface DecodedQr {
  text: string;
  /** Symbology reported by the decoder, e.g. QRCODE */
  format: string;
}

/**
 * Opaque decoder: every symbol found in one image. Throws when the image
 * cannot be read at all.
 */
export interface QRCodec {
  decode(image: Uint8Array, signal?: AbortSignal): Promise<DecodedQr[]>;
}

export type QrImageSource =
  | { kind: 'embedded'; location: string; data: Uint8Array }
  | { kind: 'attachment'; location: string; data: Uint8Array }
  | { kind: 'external'; location: string; url: string };

/**
 * Magic bytes of image formats that can carry a QR code
 */
const IMAGE_SIGNATURES: readonly number[][] = [
  [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a], // PNG
  [0xff, 0xd8, 0xff], // JPEG
  [0x47, 0x49, 0x46, 0x38], // GIF
  [0x42, 0x4d], // BMP
  [0x52, 0x49, 0x46, 0x46], // WEBP (RIFF)
];

const IMAGE_EXTENSIONS = /\.(png|jpe?g|gif|bmp|webp)$/i;
const IMG_SRC_PATTERN = /<img\b[^>]*?\bsrc\s*=\s*["']([^"']+)["']/gi;
const EXTERNAL_QR_HINT = /qr|code|barcode/i;
const DATA_IMAGE_PATTERN = /^data:image\/[a-z0-9.+-]+;base64,(.+)$/i;

export function hasImageSignature(data: Uint8Array): boolean {
  return IMAGE_SIGNATURES.some((signature) => signature.every((byte, i) => data[i] === byte));
}

function isImageAttachment(contentType: string, filename: string, data: Uint8Array): boolean {
  return contentType.toLowerCase().startsWith('image/') || IMAGE_EXTENSIONS.test(filename) || hasImageSignature(data);
}

/**
 * Inline data: images and QR-looking external images from the HTML body,
 * then image attachments, in document order
 */
export function findQrImageSources(email: EmailRecord): QrImageSource[] {
  const sources: QrImageSource[] = [];

  for (const match of email.bodyHtml.matchAll(IMG_SRC_PATTERN)) {
    const src = match[1].trim();
    const inline = src.match(DATA_IMAGE_PATTERN);
    if (inline) {
      const data = Buffer.from(inline[1].replace(/\s+/g, ''), 'base64');
      if (data.length > 0) {
        sources.push({ kind: 'embedded', location: 'embedded_image', data });
      }
    } else if (EXTERNAL_QR_HINT.test(src)) {
      sources.push({ kind: 'external', location: 'external_image', url: src });
    }
  }

  for (const attachment of email.attachments) {
    const data = Buffer.from(attachment.content, 'base64');
    if (data.length > 0 && isImageAttachment(attachment.contentType, attachment.filename, data)) {
      sources.push({ kind: 'attachment', location: `attachment:${attachment.filename}`, data });
    }
  }

  return sources;
}

const PHONE_PATTERN = /^[+]?[\d\s\-()]{7,15}$/;
const APP_STORES = ['play.google.com', 'apps.apple.com', 'microsoft.com/store'];

/**
 * First matching category wins, in this order: url, email, phone, sms, vcard, wifi, app_store, text
 */
export function classifyQrContent(content: string): QrContentType {
  const lower = content.toLowerCase();

  if (/^(?:https?|ftp):\/\//i.test(content)) return 'url';
  if (lower.startsWith('mailto:') || (content.includes('@') && content.includes('.'))) return 'email';
  if (lower.startsWith('tel:') || PHONE_PATTERN.test(content)) return 'phone';
  if (lower.startsWith('sms:') || lower.startsWith('smsto:')) return 'sms';
  if (content.startsWith('BEGIN:VCARD') || lower.includes('vcard')) return 'vcard';
  if (content.startsWith('WIFI:') || lower.includes('wifi:')) return 'wifi';
  if (APP_STORES.some((store) => lower.includes(store))) return 'app_store';
  return 'text';
}
