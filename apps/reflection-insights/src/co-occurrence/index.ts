export { CoOccurrenceComputer, computeCoOccurrence, emotionsOf } from './co-occurrence-computer';
