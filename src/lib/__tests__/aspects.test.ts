/// <reference types="vitest/globals" />
import {
  classifyHouseDistance,
  computeAspects,
  houseDistance,
  specialAspectHouses,
  standardAspectHouse,
} from '@/lib/aspects';
import { positionsAt } from './fixtures';

test('aspetto standard sulla 7ª casa: 1 → 7, 7 → 1, 10 → 4', () => {
  expect(standardAspectHouse(1)).toBe(7);
  expect(standardAspectHouse(7)).toBe(1);
  expect(standardAspectHouse(10)).toBe(4);
});

test('aspetti speciali di Marte, Giove e Saturno', () => {
  expect(specialAspectHouses('Mars', 1)).toEqual([4, 8]);
  expect(specialAspectHouses('Jupiter', 1)).toEqual([5, 9]);
  expect(specialAspectHouses('Saturn', 1)).toEqual([3, 10]);
  expect(specialAspectHouses('Saturn', 11)).toEqual([1, 8]);
  expect(specialAspectHouses('Venus', 3)).toEqual([]);
});

test('distanza tra case e relazione', () => {
  expect(houseDistance(1, 12)).toBe(1);
  expect(houseDistance(1, 7)).toBe(6);
  expect(houseDistance(2, 11)).toBe(3);
  expect(classifyHouseDistance(0)).toBe('conjunction');
  expect(classifyHouseDistance(6)).toBe('opposition');
  expect(classifyHouseDistance(3)).toBe('trine');
  expect(classifyHouseDistance(4)).toBe('square');
  expect(classifyHouseDistance(2)).toBe('sextile');
  expect(classifyHouseDistance(5)).toBeNull();
});

describe('carta con ASC Aries', () => {
  // Sun e Mars in 1ª, Jupiter in 5ª, Venus in 7ª
  const report = computeAspects(positionsAt([
    ['Sun', 10, 1],
    ['Mars', 5, 0.7],
    ['Jupiter', 125, 0.1],
    ['Venus', 185, 1.2],
  ]));

  test('relazioni: una standard per pianeta più le speciali', () => {
    expect(report.relationships).toHaveLength(8);
    expect(report.relationships[0]).toEqual({
      source: 'Sun',
      sourceHouse: 1,
      targetHouse: 7,
      targetPlanets: ['Venus'],
      kind: 'standard',
      houseOffset: 6,
      angularDistance: 180,
      strength: 'normal',
    });
    const jupiterOnFirst = report.relationships.find((r) => r.source === 'Jupiter' && r.targetHouse === 1);
    expect(jupiterOnFirst?.kind).toBe('special');
    expect(jupiterOnFirst?.targetPlanets).toEqual(['Sun', 'Mars']);
  });

  test('aspetti ricevuti da ciascuna casa', () => {
    expect(report.houseAspects[7]).toEqual([
      { planet: 'Sun', kind: 'standard' },
      { planet: 'Mars', kind: 'standard' },
    ]);
    expect(report.houseAspects[1]).toEqual([
      { planet: 'Jupiter', kind: 'special' },
      { planet: 'Venus', kind: 'standard' },
    ]);
    expect(report.houseAspects[4]).toEqual([{ planet: 'Mars', kind: 'special' }]);
    expect(report.houseAspects[2]).toEqual([]);
  });

  test('matrice di Marte', () => {
    expect(report.matrix[1]).toEqual({
      planet: 'Mars',
      house: 1,
      standard: [7],
      special: [4, 8],
      totalAspected: 3,
      strength: 'strong',
    });
  });

  test('coppie per distanza di casa', () => {
    const names = (key: keyof typeof report.pairs) => report.pairs[key].map((p) => `${p.p1}-${p.p2}`);
    expect(names('conjunction')).toEqual(['Sun-Mars']);
    expect(names('square')).toEqual(['Sun-Jupiter', 'Mars-Jupiter']);
    expect(names('opposition')).toEqual(['Sun-Venus', 'Mars-Venus']);
    expect(names('sextile')).toEqual(['Jupiter-Venus']);
    expect(names('trine')).toEqual([]);
  });

  test('benefici, malefici e aspetti più forti', () => {
    expect(report.benefic.map((b) => b.planet)).toEqual(['Sun', 'Jupiter', 'Venus']);
    expect(report.malefic).toEqual([
      { planet: 'Mars', nature: 'malefic', aspectedHouses: [7, 4, 8], note: 'Challenging influence from Mars' },
    ]);
    expect(report.strongest.map((s) => s.planet)).toEqual(['Mars', 'Jupiter', 'Sun', 'Venus']);
    expect(report.strongest[0].description).toBe('Mars has special aspects to 4th, 8th, and 7th houses');
    expect(report.strongest[0].aspectedHouses).toEqual([4, 8, 7]);
    expect(report.strongest[1].description).toBe('Jupiter has special aspects to 5th, 9th, and 7th houses');
    expect(report.strongest[2]).toMatchObject({ significance: 'normal', description: 'Sun aspects the 7th house from itself' });
  });
});
