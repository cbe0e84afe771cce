import { beforeEach, describe, expect, it, vi } from 'vitest';

const { head } = vi.hoisted(() => ({ head: vi.fn() }));

vi.mock('axios', () => ({
  default: { head },
}));

import { buildImageUrl, resolveCardImage, resolveCardImages } from '../../services/imagery/image-resolver.js';

const OPTIONS = { urlTemplate: 'https://images.example.test/cards/{cardId}.jpg', timeoutMs: 500 };

beforeEach(() => {
  head.mockReset();
});

describe('buildImageUrl', () => {
  it('substitutes and encodes the card id', () => {
    expect(buildImageUrl(OPTIONS.urlTemplate, '101')).toBe('https://images.example.test/cards/101.jpg');
    expect(buildImageUrl(OPTIONS.urlTemplate, 'a b')).toBe('https://images.example.test/cards/a%20b.jpg');
  });
});

describe('resolveCardImage', () => {
  it('returns the URL when the image is reachable', async () => {
    head.mockResolvedValue({ status: 200 });
    expect(await resolveCardImage('101', OPTIONS)).toBe('https://images.example.test/cards/101.jpg');
    expect(head).toHaveBeenCalledWith(
      'https://images.example.test/cards/101.jpg',
      expect.objectContaining({ timeout: 500 }),
    );
  });

  it('returns null for non-2xx responses', async () => {
    head.mockResolvedValue({ status: 404 });
    expect(await resolveCardImage('101', OPTIONS)).toBeNull();
  });

  it('returns null when the request fails', async () => {
    head.mockRejectedValue(new Error('timeout of 500ms exceeded'));
    expect(await resolveCardImage('101', OPTIONS)).toBeNull();
  });
});

describe('resolveCardImages', () => {
  it('looks up each distinct card id once and drops failures', async () => {
    head.mockImplementation(async (url: string) => ({ status: url.includes('/2.jpg') ? 404 : 200 }));

    const images = await resolveCardImages([{ cardId: '1' }, { cardId: '2' }, { cardId: '1' }, {}], OPTIONS);

    expect(head).toHaveBeenCalledTimes(2);
    expect([...images]).toEqual([['1', 'https://images.example.test/cards/1.jpg']]);
  });
});

describe('resolveCardImages with a slow image host', () => {
  const hang = (): Promise<never> => new Promise(() => {});

  it('returns within the deadline when a request never settles', async () => {
    head.mockImplementation(hang);

    const started = Date.now();
    const images = await resolveCardImages([{ cardId: '1' }, { cardId: '2' }], { ...OPTIONS, deadlineMs: 50 });

    expect(images.size).toBe(0);
    expect(Date.now() - started).toBeLessThan(2000);
  });

  it('keeps the images that resolved before the deadline', async () => {
    head.mockImplementation(async (url: string) => (url.includes('/1.jpg') ? { status: 200 } : hang()));

    const images = await resolveCardImages([{ cardId: '1' }, { cardId: '2' }], {
      ...OPTIONS,
      concurrency: 2,
      deadlineMs: 50,
    });

    expect([...images]).toEqual([['1', 'https://images.example.test/cards/1.jpg']]);
  });

  it('passes an abort signal to each request', async () => {
    head.mockResolvedValue({ status: 200 });
    await resolveCardImages([{ cardId: '1' }], OPTIONS);
    expect(head.mock.calls[0][1].signal).toBeInstanceOf(AbortSignal);
  });

  it('stops when the caller cancels', async () => {
    head.mockImplementation(hang);
    const controller = new AbortController();

    const pending = resolveCardImages([{ cardId: '1' }, { cardId: '2' }, { cardId: '3' }], {
      ...OPTIONS,
      concurrency: 1,
      signal: controller.signal,
    });
    setTimeout(() => controller.abort(), 20);

    expect((await pending).size).toBe(0);
  });

  it('does no lookups for an already cancelled signal', async () => {
    const controller = new AbortController();
    controller.abort();

    const images = await resolveCardImages([{ cardId: '1' }], { ...OPTIONS, signal: controller.signal });

    expect(images.size).toBe(0);
    expect(head).not.toHaveBeenCalled();
  });

  it('keeps no more lookups in flight than the concurrency limit', async () => {
    let inFlight = 0;
    let peak = 0;
    head.mockImplementation(async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 5));
      inFlight--;
      return { status: 200 };
    });

    const images = await resolveCardImages(
      ['1', '2', '3', '4', '5', '6'].map((cardId) => ({ cardId })),
      { ...OPTIONS, concurrency: 2 },
    );

    expect(images.size).toBe(6);
    expect(peak).toBe(2);
  });
});
