import { describe, it, expect } from 'vitest';
import { FpsCounter } from './fps-counter';

describe('FpsCounter', () => {
  it('reports 0 before two frames', () => {
    const counter = new FpsCounter();
    expect(counter.getFps()).toBe(0);
    counter.record(0);
    expect(counter.getFps()).toBe(0);
  });

  it('computes frames over the elapsed span', () => {
    const counter = new FpsCounter();
    for (let i = 0; i <= 60; i++) {
      counter.record(i * 16);
    }
    // 60 intervals over 960 ms
    expect(counter.getFps()).toBeCloseTo(62.5);
  });

  it('reports 0 when every sample has the same timestamp', () => {
    const counter = new FpsCounter();
    counter.record(5);
    counter.record(5);
    expect(counter.getFps()).toBe(0);
  });

  it('keeps only the last window of samples', () => {
    const counter = new FpsCounter(3);
    counter.record(0);
    counter.record(1000);
    counter.record(1010);
    counter.record(1020);
    expect(counter.sampleCount).toBe(3);
    // Samples 1000, 1010, 1020 -> 2 frames in 20 ms
    expect(counter.getFps()).toBe(100);
  });

  it('rejects windows smaller than two', () => {
    expect(() => new FpsCounter(1)).toThrow(RangeError);
  });

  it('clears samples on reset', () => {
    const counter = new FpsCounter();
    counter.record(0);
    counter.record(10);
    counter.reset();
    expect(counter.getFps()).toBe(0);
  });
});
