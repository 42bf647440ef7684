import { describe, it, expect } from 'vitest';
import { createLastImageStore } from './last-image-store.js';

describe('createLastImageStore', () => {
  it('should start empty', () => {
    expect(createLastImageStore().get()).toBeUndefined();
  });

  it('should return the stored image', () => {
    const store = createLastImageStore();
    const capturedAt = new Date('2024-05-14T10:00:00Z');

    store.set({ bytes: new Uint8Array([1, 2, 3]), mimeType: 'image/jpeg' }, capturedAt);

    const stored = store.get();
    expect(stored?.mimeType).toBe('image/jpeg');
    expect(Array.from(stored?.bytes ?? [])).toEqual([1, 2, 3]);
    expect(stored?.capturedAt.toISOString()).toBe('2024-05-14T10:00:00.000Z');
  });

  it('should replace the previous image on every write', () => {
    const store = createLastImageStore();
    store.set({ bytes: new Uint8Array([1]), mimeType: 'image/jpeg' });
    store.set({ bytes: new Uint8Array([2, 2]), mimeType: 'image/png' });

    const stored = store.get();
    expect(stored?.mimeType).toBe('image/png');
    expect(Array.from(stored?.bytes ?? [])).toEqual([2, 2]);
  });

  it('should keep a reader snapshot intact when a new image arrives', () => {
    const store = createLastImageStore();
    store.set({ bytes: new Uint8Array([1, 1, 1]), mimeType: 'image/jpeg' });

    const snapshot = store.get();
    store.set({ bytes: new Uint8Array([9, 9, 9, 9]), mimeType: 'image/png' });

    expect(Array.from(snapshot?.bytes ?? [])).toEqual([1, 1, 1]);
    expect(snapshot?.mimeType).toBe('image/jpeg');
  });

  it('should not follow later changes to the caller buffer', () => {
    const store = createLastImageStore();
    const bytes = new Uint8Array([5, 6, 7]);

    store.set({ bytes, mimeType: 'image/jpeg' });
    bytes.fill(0);

    expect(Array.from(store.get()?.bytes ?? [])).toEqual([5, 6, 7]);
  });

  it('should freeze stored snapshots', () => {
    const store = createLastImageStore();
    const stored = store.set({ bytes: new Uint8Array([1]), mimeType: 'image/jpeg' });

    expect(Object.isFrozen(stored)).toBe(true);
  });
});
