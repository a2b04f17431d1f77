export { filterAndRank, rankingScore, ResultFilterPipeline } from './filtering/ResultFilterPipeline.js';
export { classifyRegion, REGION_RULES, type RegionFeatures, type RegionRule } from './filtering/regionRules.js';
export { applyInlineCorrection, INLINE_CORRECTION_RULES } from './correction/inlineCorrection.js';
export { ConfusionCorrector, correct, batchCorrect, CONFUSION_MAP, WHEEL_CODE_GRAMMARS } from './correction/ConfusionCorrector.js';
export { groupLines } from './lines/LineGrouper.js';
export { fuse, MultiSourceFusion } from './fusion/MultiSourceFusion.js';
export { fuseLines } from './fusion/lineFusion.js';
export { FUSION_STRATEGIES } from './fusion/strategies.js';
export { parseObservation, parseObservationList, parsePerImageResult } from './parsing.js';
export { WheelCodeRecognizer, type WheelCodeRecognizerDependencies } from './WheelCodeRecognizer.js';
export * from './sources/index.js';
