import { describe, it, expect } from 'vitest';
import { buildInsights, classifyPerformance, projectMarathon } from '../src/engine/insights.js';
import { derive } from '../src/engine/calculator.js';

describe('classifyPerformance', () => {
  it('maps pace to tiers at inclusive thresholds', () => {
    expect(classifyPerformance(2.8).tier).toBe('elite');
    expect(classifyPerformance(3).tier).toBe('elite');
    expect(classifyPerformance(3.01).tier).toBe('excellent');
    expect(classifyPerformance(4).tier).toBe('excellent');
    expect(classifyPerformance(5).tier).toBe('good');
    expect(classifyPerformance(6).tier).toBe('solid');
    expect(classifyPerformance(6.5).tier).toBe('building');
  });

  it('carries a message', () => {
    expect(classifyPerformance(4.5).message).toBe("Good performance! You're above average.");
  });
});

describe('projectMarathon', () => {
  it('projects for shorter runs only', () => {
    expect(projectMarathon(4, 10)).toBe('2:48:47');
    expect(projectMarathon(4, 42.195)).toBeNull();
    expect(projectMarathon(4, 50)).toBeNull();
  });
});

describe('buildInsights', () => {
  it('combines tier and projection', () => {
    const res = derive({ distance: '10km', time: '45:00' });
    if (!res.ok) throw new Error(res.error.message);
    expect(buildInsights(res.value)).toEqual({
      performance: { tier: 'good', message: "Good performance! You're above average." },
      marathon_projection: '3:09:53'
    });
  });
});
