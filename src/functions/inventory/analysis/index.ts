export { aggregateCosts } from './costAggregator';
export { classifyWaste, NO_WASTE_RECOMMENDATION } from './wasteClassifier';
