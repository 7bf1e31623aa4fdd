/**
 * Statistics Module - Barrel Export
 */

export { StatisticsCalculator, type PersonStatistics } from './statistics-calculator';
