import type { RollingStockClass } from './types';

// Cars still wearing heritage liveries
const HERITAGE_UNITS = ['280', '276', '293', '304', '401'];

export const ROLLING_STOCK_COLORS: Record<RollingStockClass, string> = {
  'heritage': '#f97316',
  'push-pull': '#16a34a',
  'silverliner-v': '#dc2626',
  'silverliner-iv': '#2563eb',
  'unknown': '#000000',
};

/**
 * Infer the rolling stock class from a consist string such as "702,701".
 * The lead car's number range decides the class, unless any car is a
 * heritage unit.
 */
export function classifyConsist(consist: string | null): RollingStockClass {
  if (!consist) return 'unknown';

  const cars = consist.split(',').map(car => car.trim()).filter(car => car.length > 0);
  if (cars.some(car => HERITAGE_UNITS.includes(car))) {
    return 'heritage';
  }

  const leadCar = cars[0];
  if (!leadCar || !/^\d+$/.test(leadCar)) return 'unknown';

  const number = parseInt(leadCar, 10);
  if (number > 900) return 'push-pull';
  if (number >= 700) return 'silverliner-v';
  return 'silverliner-iv';
}
