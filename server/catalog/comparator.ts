import type { CanonicalTemplate, TemplateEnvVar } from '../../shared/types';
import { jaccardSimilarity, sequenceRatio } from '../utils/text';

export const SIMILARITY_WEIGHTS = {
  title: 0.3,
  image: 0.25,
  description: 0.2,
  stackfile: 0.15,
  env: 0.1,
} as const;

export const textSimilarity = (left: string | undefined, right: string | undefined): number => {
  const a = left ?? '';
  const b = right ?? '';
  if (!a && !b) return 1;
  if (!a || !b) return 0;
  return sequenceRatio(a.toLowerCase(), b.toLowerCase());
};

/** Jaccard over env var names. Two empty lists are identical; one empty list matches nothing. */
export const compareEnvNames = (left: TemplateEnvVar[] = [], right: TemplateEnvVar[] = []): number => {
  if (!left.length && !right.length) return 1;
  if (!left.length || !right.length) return 0;
  return jaccardSimilarity(new Set(left.map((v) => v.name)), new Set(right.map((v) => v.name)));
};

const stackfileSimilarity = (a: CanonicalTemplate, b: CanonicalTemplate): number => {
  const left = a.repository?.stackfile;
  const right = b.repository?.stackfile;
  if (left === undefined || right === undefined) return 0;
  return textSimilarity(left, right);
};

/** Weighted similarity in [0, 1] over title, image, description, stack file and env names. */
export const calculateSimilarity = (a: CanonicalTemplate, b: CanonicalTemplate): number =>
  textSimilarity(a.title, b.title) * SIMILARITY_WEIGHTS.title +
  textSimilarity(a.image, b.image) * SIMILARITY_WEIGHTS.image +
  textSimilarity(a.description, b.description) * SIMILARITY_WEIGHTS.description +
  stackfileSimilarity(a, b) * SIMILARITY_WEIGHTS.stackfile +
  compareEnvNames(a.env, b.env) * SIMILARITY_WEIGHTS.env;

const IMAGE_ARCH_HINTS: Array<{ arch: string; needles: string[] }> = [
  // arm64 must be checked before the bare "arm" substring it contains.
  { arch: 'arm64', needles: ['arm64', 'aarch64'] },
  { arch: 'arm', needles: ['arm'] },
  { arch: 'amd64', needles: ['amd64', 'x86_64'] },
  { arch: '386', needles: ['386', 'i386'] },
];

const STACKFILE_ARCH_HINTS = ['arm64', 'amd64'];

export const DEFAULT_ARCHITECTURE = 'linux';

/** Platform wins, then hints in the image reference, then in the stack file. */
export const detectArchitecture = (template: CanonicalTemplate): string => {
  const platform = (template.platform ?? '').toLowerCase();
  if (platform) return platform;

  const image = (template.image ?? '').toLowerCase();
  const imageHint = IMAGE_ARCH_HINTS.find(({ needles }) => needles.some((needle) => image.includes(needle)));
  if (imageHint) return imageHint.arch;

  const stackfile = (template.repository?.stackfile ?? '').toLowerCase();
  const stackHint = STACKFILE_ARCH_HINTS.find((arch) => stackfile.includes(arch));
  if (stackHint) return stackHint;

  return DEFAULT_ARCHITECTURE;
};
