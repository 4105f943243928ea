/**
 * QR Evaluator Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { QrEvaluator, assessQrContent } from '@/lib/detection/evaluators';
import { createEmailRecord } from '@/lib/detection/parser';
import { classifyQrContent, findQrImageSources, hasImageSignature, type QRCodec } from '@/lib/detection/qr-codec';
import { CircuitBreaker } from '@/lib/resilience/circuit-breaker';
import { PNG_BYTES_BASE64 } from '../fixtures/emails';
import { silentLogger, testContext } from '../helpers/setup';

function codecReturning(...texts: string[]): QRCodec {
  return { decode: vi.fn(async () => texts.map((text) => ({ text, format: 'QRCODE' }))) };
}

const qrAttachmentEmail = createEmailRecord({
  from: 'hr@corp.example',
  attachments: [{ filename: 'qr.png', contentType: 'image/png', content: PNG_BYTES_BASE64 }],
});

describe('QR Evaluator', () => {
  describe('image sources', () => {
    it('should recognize image magic bytes', () => {
      expect(hasImageSignature(Buffer.from(PNG_BYTES_BASE64, 'base64'))).toBe(true);
      expect(hasImageSignature(Buffer.from('plain text'))).toBe(false);
    });

    it('should find inline, external and attached images in order', () => {
      const email = createEmailRecord({
        bodyHtml:
          `<img src="data:image/png;base64,${PNG_BYTES_BASE64}">` +
          '<img src="https://cdn.example.com/logo.png">' +
          '<img src="https://cdn.example.com/qr-code.png">',
        attachments: [
          { filename: 'qr.png', contentType: 'image/png', content: PNG_BYTES_BASE64 },
          { filename: 'notes.txt', contentType: 'text/plain', content: Buffer.from('hello').toString('base64') },
        ],
      });

      expect(findQrImageSources(email).map((source) => `${source.kind}:${source.location}`)).toEqual([
        'embedded:embedded_image',
        'external:external_image',
        'attachment:attachment:qr.png',
      ]);
    });
  });

  describe('classifyQrContent', () => {
    it('should label payloads by type', () => {
      expect(classifyQrContent('https://example.com')).toBe('url');
      expect(classifyQrContent('mailto:help@example.com')).toBe('email');
      expect(classifyQrContent('tel:+15550100')).toBe('phone');
      expect(classifyQrContent('SMSTO:+15550100:hi')).toBe('sms');
      expect(classifyQrContent('BEGIN:VCARD\nFN:Jane\nEND:VCARD')).toBe('vcard');
      expect(classifyQrContent('WIFI:S:Office;T:WPA;P:test-secret;;')).toBe('wifi');
      expect(classifyQrContent('hello there')).toBe('text');
    });
  });

  describe('assessQrContent', () => {
    it('should score a URL pointing at a raw IP', () => {
      const code = assessQrContent('http://203.0.113.10/verify', 'attachment:qr.png');

      expect(code.contentType).toBe('url');
      expect(code.score).toBe(1);
      expect(code.reasons).toEqual([
        'Contains QR code (requires user interaction)',
        'QR URL uses IP address',
        'QR URL uses insecure HTTP',
        'QR URL contains suspicious path: /verify',
        'Contains suspicious keywords: verify',
      ]);
    });

    it('should not go below zero for trusted domains', () => {
      const code = assessQrContent('https://www.google.com/maps', 'embedded_image');

      expect(code.score).toBe(0);
      expect(code.reasons).toEqual(['Contains QR code (requires user interaction)', 'QR URL points to a trusted domain']);
    });

    it('should score open WiFi networks', () => {
      const code = assessQrContent('WIFI:S:FreeGuest;T:nopass;;', 'embedded_image');

      expect(code.contentType).toBe('wifi');
      expect(code.score).toBe(0.9);
    });

    it('should flag cryptocurrency addresses in text', () => {
      const code = assessQrContent('send to 0x52908400098527886E0F7030069857D2E4169EE7', 'embedded_image');

      expect(code.contentType).toBe('text');
      expect(code.reasons).toContain('QR contains cryptocurrency address');
      expect(code.score).toBe(0.7);
    });
  });

  describe('evaluate', () => {
    it('should decode attachments and score their payloads', async () => {
      const codec = codecReturning('http://203.0.113.10/verify');
      const finding = await new QrEvaluator({ codec }).evaluate(qrAttachmentEmail, testContext());

      expect(codec.decode).toHaveBeenCalledTimes(1);
      expect(finding.score).toBe(1);
      expect(finding.details?.suspiciousCount).toBe(1);
      expect(finding.reasons).toEqual([
        'QR url: Contains QR code (requires user interaction)',
        'QR url: QR URL uses IP address',
      ]);
      expect(finding.confidence).toBeCloseTo(0.95, 10);
      expect(finding.summary).toBe('Analyzed 1 QR codes. 1 suspicious QR codes detected. Types found: 1 url');
    });

    it('should report no codes when nothing is found', async () => {
      const finding = await new QrEvaluator({ codec: codecReturning() }).evaluate(
        createEmailRecord({ bodyText: 'plain' }),
        testContext()
      );

      expect(finding).toMatchObject({ score: 0, confidence: 1, reasons: [], summary: 'No QR codes found in email' });
    });

    it('should skip inline images when no codec is configured', async () => {
      const finding = await new QrEvaluator().evaluate(qrAttachmentEmail, testContext());

      expect(finding.details?.totalCodes).toBe(0);
      expect(finding.score).toBe(0);
    });

    it('should score external QR images without decoding them', async () => {
      const email = createEmailRecord({ bodyHtml: '<img src="https://cdn.example.com/qr-code.png">' });

      const finding = await new QrEvaluator().evaluate(email, testContext());

      expect(finding.details?.codes).toEqual([
        {
          content: 'External QR image: https://cdn.example.com/qr-code.png',
          contentType: 'external_image',
          location: 'external_image',
          score: 0.4,
          reasons: ['Contains QR code (requires user interaction)', 'QR code loaded from external source'],
        },
      ]);
      expect(finding.score).toBe(0.4);
      expect(finding.summary).toBe('Analyzed 1 QR codes. No highly suspicious QR codes detected');
    });

    it('should keep an undecodable image as a low-confidence entry', async () => {
      const codec: QRCodec = { decode: vi.fn().mockRejectedValue(new Error('unreadable image')) };

      const finding = await new QrEvaluator({ codec }).evaluate(qrAttachmentEmail, testContext());

      expect(finding.details?.codes).toEqual([
        {
          content: '',
          contentType: 'undecoded',
          location: 'attachment:qr.png',
          score: 0.4,
          reasons: ['QR image could not be decoded: unreadable image'],
        },
      ]);
      expect(finding.confidence).toBe(0.7);
    });

    it('should decode through the circuit breaker', async () => {
      const breaker = new CircuitBreaker('qr-codec', { failureThreshold: 1, logger: silentLogger() });
      await breaker.execute(() => Promise.reject(new Error('codec crashed'))).catch(() => undefined);
      const codec = codecReturning('https://example.com');

      const finding = await new QrEvaluator({ codec, breaker }).evaluate(qrAttachmentEmail, testContext());

      expect(codec.decode).not.toHaveBeenCalled();
      expect(finding.details?.codes[0].reasons).toEqual(['QR image could not be decoded: Circuit is open']);
    });
  });
});
