import { z } from 'zod';
import type { CanonicalTemplate, TemplateEnvVar, TemplatePort, TemplateVolume } from '../../shared/types';
import { parsePortEntry } from './converters/compose';
import { err, ok, type Result } from './errors';
import { asStringArray, asText, isRecord, type JsonRecord } from '../utils/records';

const TEXT_FIELDS = ['description', 'image', 'logo', 'platform', 'restart_policy', 'note'] as const;

/** Fields a cleaned template keeps; everything else is dropped by `sanitizeTemplate`. */
export const STANDARD_FIELDS = [
  'title',
  'description',
  'image',
  'logo',
  'categories',
  'platform',
  'restart_policy',
  'ports',
  'volumes',
  'env',
  'labels',
  'repository',
  'note',
  'type',
  'administrator_only',
  'hostname',
] as const;

const STANDARD_FIELD_SET = new Set<string>(STANDARD_FIELDS);

const KNOWN_FIELDS = new Set<string>([
  'title',
  ...TEXT_FIELDS,
  'categories',
  'env',
  'ports',
  'volumes',
  'administrator_only',
  'repository',
  '_source',
]);

const ENV_FIELDS = new Set(['name', 'default', 'value', 'label', 'description']);
const VOLUME_FIELDS = new Set(['container', 'bind', 'readonly']);
const REPOSITORY_FIELDS = new Set(['url', 'stackfile']);

const copyExtras = (target: Record<string, unknown>, raw: JsonRecord, known: Set<string>) => {
  for (const [key, value] of Object.entries(raw)) {
    if (!known.has(key)) target[key] = value;
  }
};

/**
 * Reads `default`, falling back to the legacy `value` key. The result never
 * carries `value`; other keys (`select`, `preset`...) pass through.
 */
export const normalizeEnvVar = (entry: unknown): TemplateEnvVar | null => {
  if (!isRecord(entry)) return null;
  const name = asText(entry.name);
  if (!name) return null;
  const normalized: TemplateEnvVar = { name };
  const fallback = asText(entry.default) ?? asText(entry.value);
  if (fallback !== undefined) normalized.default = fallback;
  const label = asText(entry.label);
  if (label !== undefined) normalized.label = label;
  const description = asText(entry.description);
  if (description !== undefined) normalized.description = description;
  copyExtras(normalized, entry, ENV_FIELDS);
  return normalized;
};

const normalizePorts = (value: unknown): TemplatePort[] | undefined => {
  if (!Array.isArray(value)) return undefined;
  const ports: TemplatePort[] = [];
  for (const entry of value) {
    if (isRecord(entry)) {
      // Multi-key maps are split so every element stays a single label/spec pair.
      for (const [label, raw] of Object.entries(entry)) {
        const spec = asText(raw);
        if (spec !== undefined) ports.push({ [label]: spec });
      }
      continue;
    }
    // Bare Portainer strings ("8080:80/tcp") keep their text under a "Port N" label.
    const spec = asText(entry);
    const parsed = parsePortEntry(spec);
    if (spec !== undefined && parsed) {
      const [label] = Object.keys(parsed);
      ports.push({ [label]: spec });
    }
  }
  return ports;
};

const normalizeVolumes = (value: unknown): TemplateVolume[] | undefined => {
  if (!Array.isArray(value)) return undefined;
  const volumes: TemplateVolume[] = [];
  for (const entry of value) {
    if (!isRecord(entry)) continue;
    const container = asText(entry.container);
    if (!container) continue;
    const volume: TemplateVolume = { container };
    const bind = asText(entry.bind);
    if (bind !== undefined) volume.bind = bind;
    if (typeof entry.readonly === 'boolean') volume.readonly = entry.readonly;
    copyExtras(volume, entry, VOLUME_FIELDS);
    volumes.push(volume);
  }
  return volumes;
};

/**
 * Lenient read of a template record coming from a source document. Known
 * fields with the wrong shape are dropped; unknown fields are kept as-is.
 * A missing title becomes `''` so the record is discarded at grouping time.
 */
export const coerceTemplate = (raw: JsonRecord): CanonicalTemplate => {
  const template: CanonicalTemplate = { title: asText(raw.title) ?? '' };

  for (const field of TEXT_FIELDS) {
    const value = asText(raw[field]);
    if (value !== undefined) template[field] = value;
  }

  const categories = asStringArray(raw.categories);
  if (categories) template.categories = categories;

  if (Array.isArray(raw.env)) {
    template.env = raw.env.map(normalizeEnvVar).filter((entry): entry is TemplateEnvVar => entry !== null);
  }

  const ports = normalizePorts(raw.ports);
  if (ports) template.ports = ports;

  const volumes = normalizeVolumes(raw.volumes);
  if (volumes) template.volumes = volumes;

  if (typeof raw.administrator_only === 'boolean') template.administrator_only = raw.administrator_only;

  if (isRecord(raw.repository)) {
    const url = asText(raw.repository.url);
    const stackfile = asText(raw.repository.stackfile);
    template.repository = {};
    if (url !== undefined) template.repository.url = url;
    if (stackfile !== undefined) template.repository.stackfile = stackfile;
    copyExtras(template.repository, raw.repository, REPOSITORY_FIELDS);
  }

  const source = asText(raw._source);
  if (source !== undefined) template._source = source;

  for (const [key, value] of Object.entries(raw)) {
    if (!KNOWN_FIELDS.has(key)) template[key] = value;
  }

  return template;
};

/** Keeps only the standard template fields. A record needs at least a title or an image. */
export const sanitizeTemplate = (raw: unknown): CanonicalTemplate => {
  if (!isRecord(raw)) {
    throw new Error('Template must be an object');
  }
  if (!('title' in raw) && !('image' in raw)) {
    throw new Error("Template must have at least a 'title' or 'image' field");
  }
  const coerced = coerceTemplate(raw);
  const cleaned: CanonicalTemplate = { title: coerced.title };
  for (const [key, value] of Object.entries(coerced)) {
    if (STANDARD_FIELD_SET.has(key) && value !== undefined) cleaned[key] = value;
  }
  return cleaned;
};

const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const EnvVarSchema = z
  .object({
    name: z.string().trim().min(1, 'Environment variable name is required'),
    default: z.string().optional(),
    value: z.string().optional(),
    label: z.string().optional(),
    description: z.string().optional(),
  })
  .transform(({ value, ...rest }): TemplateEnvVar => {
    const envVar: TemplateEnvVar = { name: rest.name };
    const fallback = rest.default ?? value;
    if (fallback !== undefined) envVar.default = fallback;
    if (rest.label) envVar.label = rest.label;
    if (rest.description) envVar.description = rest.description;
    return envVar;
  });

const PortSchema = z
  .record(z.string())
  .refine((port) => Object.keys(port).length === 1, 'Each port needs exactly one label and spec');

const VolumeSchema = z.object({
  container: z.string().trim().min(1, 'Volume container path is required'),
  bind: z.string().trim().min(1, 'Volume bind is required'),
  readonly: z.boolean().optional(),
});

export const ManualTemplateSchema = z.object({
  title: z.string({ required_error: 'Title is required' }).trim().min(1, 'Title is required'),
  image: z.string({ required_error: 'Image is required' }).trim().min(1, 'Image is required'),
  description: optionalText,
  logo: optionalText,
  platform: optionalText,
  restart_policy: z.enum(['unless-stopped', 'always', 'no', 'on-failure']).optional(),
  categories: z.array(z.string().trim().min(1)).optional(),
  env: z.array(EnvVarSchema).optional(),
  ports: z.array(PortSchema).optional(),
  volumes: z.array(VolumeSchema).optional(),
  note: optionalText,
  administrator_only: z.boolean().optional(),
  repository: z
    .object({
      url: z.string().optional(),
      stackfile: z.string().optional(),
    })
    .optional(),
});

export type ManualTemplateInput = z.input<typeof ManualTemplateSchema>;

const formatIssuePath = (path: Array<string | number>): string => (path.length ? path.join('.') : 'template');

/**
 * Validates a manually authored template. Only a non-empty title and image
 * are mandatory; empty optional text and empty lists are dropped.
 */
export const validateManualTemplate = (input: unknown): Result<CanonicalTemplate, string[]> => {
  const parsed = ManualTemplateSchema.safeParse(input);
  if (!parsed.success) {
    return err(parsed.error.issues.map((issue) => `${formatIssuePath(issue.path)}: ${issue.message}`));
  }

  const { title, image, categories, env, ports, volumes, ...rest } = parsed.data;
  const template: CanonicalTemplate = { title, image };
  for (const [key, value] of Object.entries(rest)) {
    if (value !== undefined) template[key] = value;
  }
  if (categories?.length) template.categories = categories;
  if (env?.length) template.env = env;
  if (ports?.length) template.ports = ports;
  if (volumes?.length) template.volumes = volumes;
  return ok(template);
};
