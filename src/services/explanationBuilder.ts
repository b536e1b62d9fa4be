import { Classification, DetectionOutcome, FeatureContribution } from '../types';

interface CuePhrases {
  ai: string;
  human: string;
}

// Keyed by feature name prefix; first match wins
const CUES: ReadonlyArray<[prefix: string, phrases: CuePhrases]> = [
  ['f0_std', { ai: 'flat pitch contour', human: 'natural pitch variation' }],
  ['f0_mean', { ai: 'atypical pitch level', human: 'typical pitch level' }],
  ['jitter', { ai: 'unusually stable pitch periods', human: 'natural pitch micro-variation' }],
  ['voiced_fraction', { ai: 'unbroken voicing', human: 'natural voicing breaks' }],
  ['shimmer', { ai: 'uniform loudness', human: 'natural loudness variation' }],
  ['rms_std', { ai: 'flat energy envelope', human: 'dynamic energy envelope' }],
  ['low_energy_ratio', { ai: 'few pauses', human: 'natural pauses' }],
  ['zcr', { ai: 'steady articulation', human: 'irregular articulation' }],
  ['onset', { ai: 'mechanical speech rhythm', human: 'natural speech rhythm' }],
  ['tempo', { ai: 'mechanical speech rhythm', human: 'natural speech rhythm' }],
  ['mfcc', { ai: 'low timbral variability', human: 'varied timbre' }],
  ['flatness', { ai: 'noise-like spectral texture', human: 'harmonic spectral texture' }],
  ['centroid', { ai: 'uniform spectral balance', human: 'shifting spectral balance' }],
  ['rolloff', { ai: 'uniform high-frequency content', human: 'varied high-frequency content' }],
  ['bandwidth', { ai: 'uniform spectral spread', human: 'varied spectral spread' }],
];

const MAX_CUES = 3;

const describe = (name: string, label: Classification): string => {
  const match = CUES.find(([prefix]) => name.startsWith(prefix));
  if (!match) return name.replace(/_/g, ' ');
  return label === Classification.AI_GENERATED ? match[1].ai : match[1].human;
};

/**
 * Collect up to three distinct cues that pushed the score toward the label.
 */
export const supportingCues = (
  contributions: readonly FeatureContribution[],
  label: Classification
): string[] => {
  const direction = label === Classification.AI_GENERATED ? 1 : -1;
  const cues: string[] = [];

  for (const item of contributions) {
    if (Math.sign(item.contribution) !== direction) continue;
    const phrase = describe(item.name, label);
    if (!cues.includes(phrase)) cues.push(phrase);
    if (cues.length === MAX_CUES) break;
  }

  return cues;
};

/**
 * Generate a human-readable explanation for the classification
 */
export const generateExplanation = (outcome: DetectionOutcome): string => {
  if (outcome.silent) {
    return 'No speech detected: the recording is silent';
  }

  const { label } = outcome.result;
  const cues = supportingCues(outcome.contributions, label);

  if (cues.length === 0) {
    return label === Classification.AI_GENERATED
      ? 'No distinctive human speech characteristics detected'
      : 'No distinctive synthetic speech characteristics detected';
  }

  const joined = cues.length === 1
    ? cues[0]
    : `${cues.slice(0, -1).join(', ')} and ${cues[cues.length - 1]}`;

  const sentence = label === Classification.AI_GENERATED
    ? `Synthetic speech indicators: ${joined}`
    : `Natural speech indicators: ${joined}`;

  return sentence;
};
