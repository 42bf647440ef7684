import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Hono } from 'hono';
import type { ExtractionRequest } from '@snapcal/shared/src/types/extraction.types.js';
import { LlmError, ScreenshotError } from '@snapcal/shared/src/utils/errors.js';
import type { CalendarLlmClient } from '@snapcal/core/src/llm/llm-client.js';
import type { ScreenshotProvider } from '@snapcal/core/src/screenshot/types.js';
import type { LastImageStore } from '@snapcal/core/src/cache/last-image-store.js';
import {
  createCorruptJpeg,
  createCorruptPng,
  createTestJpeg,
  withClaimedDimensions,
} from '@snapcal/core/src/test-support/images.js';
import { createTestApp } from '../test-helpers.js';
import type { AppEnv } from '../types.js';

const CALENDAR = [
  'BEGIN:VCALENDAR',
  'VERSION:2.0',
  'BEGIN:VEVENT',
  'DTSTART;TZID=Europe/Berlin:20240520T190000',
  'DTEND;TZID=Europe/Berlin:20240520T200000',
  'SUMMARY:Dinner with Alex',
  'END:VEVENT',
  'END:VCALENDAR',
].join('\r\n');

const NOW = new Date('2024-05-14T08:30:00Z');
const REQUEST_ID = 'test-request';

function postText(app: Hono<AppEnv>, text: string): Promise<Response> {
  return Promise.resolve(
    app.request('/text', {
      method: 'POST',
      headers: {
        'Content-Type': 'application/x-www-form-urlencoded',
        'X-Request-Id': REQUEST_ID,
      },
      body: new URLSearchParams({ text }).toString(),
    }),
  );
}

function postForm(app: Hono<AppEnv>, path: string, form: FormData): Promise<Response> {
  return Promise.resolve(
    app.request(path, {
      method: 'POST',
      headers: { 'X-Request-Id': REQUEST_ID },
      body: form,
    }),
  );
}

describe('Extraction Routes', () => {
  let app: Hono<AppEnv>;
  let lastImageStore: LastImageStore;
  let llmClient: CalendarLlmClient;
  let screenshotProvider: ScreenshotProvider;
  let requests: ExtractionRequest[];

  beforeEach(() => {
    requests = [];
    llmClient = {
      complete: vi.fn((request: ExtractionRequest) => {
        requests.push(request);
        return Promise.resolve(CALENDAR);
      }),
    };
    screenshotProvider = {
      name: 'fake',
      capture: vi.fn(() =>
        Promise.resolve({ bytes: createTestJpeg(), mimeType: 'image/jpeg' as const }),
      ),
    };
    ({ app, lastImageStore } = createTestApp({ llmClient, screenshotProvider, now: NOW }));
  });

  describe('POST /text', () => {
    it('should return the calendar text for an event description', async () => {
      const res = await postText(app, 'Dinner with Alex on 20 May at 7pm');

      expect(res.status).toBe(200);
      expect(res.headers.get('Content-Type')).toBe('text/calendar; charset=utf-8');
      expect(await res.text()).toBe(CALENDAR);

      const [request] = requests;
      expect(request?.kind).toBe('text');
      if (request?.kind === 'text') {
        expect(request.prompt).toContain('which is 2024-05-14.');
        expect(request.prompt).toContain('Dinner with Alex on 20 May at 7pm');
      }
      expect(screenshotProvider.capture).not.toHaveBeenCalled();
    });

    it('should accept a multipart form', async () => {
      const form = new FormData();
      form.append('text', 'Dinner with Alex on 20 May at 7pm');

      const res = await postForm(app, '/text', form);

      expect(res.status).toBe(200);
      expect(await res.text()).toBe(CALENDAR);
    });

    it('should render a URL and send the screenshot to the model', async () => {
      const res = await postText(app, 'https://example.com/concert');

      expect(res.status).toBe(200);
      expect(screenshotProvider.capture).toHaveBeenCalledTimes(1);
      expect(requests[0]?.kind).toBe('image');
      expect(lastImageStore.get()?.mimeType).toBe('image/jpeg');
    });

    it('should hide screenshot failures behind a generic error', async () => {
      vi.mocked(screenshotProvider.capture).mockRejectedValue(
        new ScreenshotError('Screenshot request failed: apiflash responded with status 401'),
      );

      const res = await postText(app, 'https://example.com/concert');

      expect(res.status).toBe(500);
      expect(await res.json()).toEqual({
        error: 'Internal server error',
        code: 'INTERNAL_ERROR',
        requestId: REQUEST_ID,
      });
      expect(llmClient.complete).not.toHaveBeenCalled();
    });

    it('should hide model failures behind a generic error', async () => {
      vi.mocked(llmClient.complete).mockRejectedValue(new LlmError('No response content', 'no_content'));

      const res = await postText(app, 'Dinner with Alex');

      expect(res.status).toBe(500);
      expect(await res.json()).toEqual({
        error: 'Internal server error',
        code: 'INTERNAL_ERROR',
        requestId: REQUEST_ID,
      });
    });

    it('should forward a reply that is not a valid calendar', async () => {
      vi.mocked(llmClient.complete).mockResolvedValue('BEGIN:VCALENDAR\r\nEND:VCALENDAR');

      const res = await postText(app, 'Dinner with Alex');

      expect(res.status).toBe(200);
      expect(await res.text()).toBe('BEGIN:VCALENDAR\r\nEND:VCALENDAR');
    });

    it('should return 400 for blank text', async () => {
      const res = await postText(app, '   ');

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ code: 'VALIDATION_ERROR', requestId: REQUEST_ID });
      expect(llmClient.complete).not.toHaveBeenCalled();
    });

    it('should return 400 when the text field is missing', async () => {
      const form = new FormData();
      form.append('other', 'value');

      const res = await postForm(app, '/text', form);

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ code: 'VALIDATION_ERROR' });
    });
  });

  describe('POST /image', () => {
    it('should return the calendar text for an uploaded picture', async () => {
      const form = new FormData();
      form.append('file', new Blob([createTestJpeg()], { type: 'image/jpeg' }), 'poster.jpg');

      const res = await postForm(app, '/image', form);

      expect(res.status).toBe(200);
      expect(await res.text()).toBe(CALENDAR);
      const [request] = requests;
      expect(request?.kind).toBe('image');
      if (request?.kind === 'image') {
        expect(request.imageDataUri.startsWith('data:image/jpeg;base64,/9j/')).toBe(true);
        expect(request.instruction).toContain('The image is shown below.');
      }
    });

    it('should read the first file part and skip text fields', async () => {
      const form = new FormData();
      form.append('note', 'from the fridge door');
      form.append('file', new Blob([createTestJpeg()], { type: 'image/jpeg' }), 'poster.jpg');

      const res = await postForm(app, '/image', form);

      expect(res.status).toBe(200);
    });

    it('should return 400 when the form has no file', async () => {
      const form = new FormData();
      form.append('text', 'hello');

      const res = await postForm(app, '/image', form);

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: 'No image found in request',
        code: 'NO_IMAGE',
        requestId: REQUEST_ID,
      });
      expect(llmClient.complete).not.toHaveBeenCalled();
    });

    it('should return 400 when the body is not multipart', async () => {
      const res = await app.request('/image', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', 'X-Request-Id': REQUEST_ID },
        body: '{}',
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ code: 'NO_IMAGE' });
    });

    it('should reject a corrupt JPEG without calling the model', async () => {
      const form = new FormData();
      form.append('file', new Blob([createCorruptJpeg()], { type: 'image/jpeg' }), 'broken.jpg');

      const res = await postForm(app, '/image', form);

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: 'Image could not be decoded',
        code: 'INVALID_IMAGE',
        requestId: REQUEST_ID,
      });
      expect(llmClient.complete).not.toHaveBeenCalled();
    });

    it('should reject a corrupt PNG without calling the model', async () => {
      const form = new FormData();
      form.append('file', new Blob([createCorruptPng()], { type: 'image/png' }), 'broken.png');

      const res = await postForm(app, '/image', form);

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: 'Image could not be decoded',
        code: 'INVALID_IMAGE',
        requestId: REQUEST_ID,
      });
      expect(llmClient.complete).not.toHaveBeenCalled();
    });

    it('should reject a JPEG whose header claims a huge canvas', async () => {
      const bytes = withClaimedDimensions(createTestJpeg(8, 8), 20_000, 20_000);
      const form = new FormData();
      form.append('file', new Blob([bytes], { type: 'image/jpeg' }), 'huge.jpg');

      const res = await postForm(app, '/image', form);

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        error: 'Image dimensions 20000x20000 exceed the limit',
        code: 'INVALID_IMAGE',
      });
      expect(llmClient.complete).not.toHaveBeenCalled();
    });

    it('should reject a file that is not an image', async () => {
      const form = new FormData();
      form.append('file', new Blob(['just some notes'], { type: 'text/plain' }), 'notes.txt');

      const res = await postForm(app, '/image', form);

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        error: 'Unsupported image type: unknown',
        code: 'INVALID_IMAGE',
      });
    });

    it('should not touch the last image store', async () => {
      const form = new FormData();
      form.append('file', new Blob([createTestJpeg()], { type: 'image/jpeg' }), 'poster.jpg');

      await postForm(app, '/image', form);

      expect(lastImageStore.get()).toBeUndefined();
    });
  });

  describe('body limit', () => {
    it('should return 413 when the upload exceeds the limit', async () => {
      ({ app } = createTestApp({ llmClient, screenshotProvider, bodyLimitBytes: 64 }));
      const form = new FormData();
      form.append('file', new Blob([new Uint8Array(1024)], { type: 'image/jpeg' }), 'big.jpg');

      const res = await postForm(app, '/image', form);

      expect(res.status).toBe(413);
      expect(await res.json()).toEqual({
        error: 'Request body too large',
        code: 'PAYLOAD_TOO_LARGE',
        requestId: REQUEST_ID,
      });
    });

    it('should return 413 when a form field exceeds the limit', async () => {
      ({ app } = createTestApp({ llmClient, screenshotProvider, bodyLimitBytes: 64 }));

      const res = await postText(app, 'Dinner with Alex '.repeat(20));

      expect(res.status).toBe(413);
      expect(await res.json()).toEqual({
        error: 'Request body too large',
        code: 'PAYLOAD_TOO_LARGE',
        requestId: REQUEST_ID,
      });
      expect(llmClient.complete).not.toHaveBeenCalled();
    });
  });
});
