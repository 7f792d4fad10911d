import type {
  CanonicalTemplate,
  RestartPolicy,
  TemplateCollection,
  TemplateEnvVar,
  TemplatePort,
  TemplateVolume,
} from '../../../shared/types';
import categoryKeywords from '../../data/categoryKeywords.json';
import { ConversionError, err, ok, type Result } from '../errors';
import { asText, hasKey, isRecord, type JsonRecord } from '../../utils/records';

const RESTART_POLICIES: readonly RestartPolicy[] = ['no', 'always', 'on-failure', 'unless-stopped'];

const DEFAULT_CATEGORY = 'tools';

const MAX_NOTE_LABELS = 3;

export const DATA_PREFIX = '!data/';

const isRestartPolicy = (value: string): value is RestartPolicy =>
  RESTART_POLICIES.some((policy) => policy === value);

export const toTitleCase = (value: string): string =>
  value.replace(/\p{L}+/gu, (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());

const readLabels = (value: unknown): Array<[string, string]> => {
  if (Array.isArray(value)) {
    return value
      .map(asText)
      .filter((entry): entry is string => entry !== undefined)
      .map((entry): [string, string] => {
        const idx = entry.indexOf('=');
        return idx === -1 ? [entry, ''] : [entry.slice(0, idx), entry.slice(idx + 1)];
      });
  }
  if (isRecord(value)) {
    return Object.entries(value).map(([key, raw]): [string, string] => [key, asText(raw) ?? '']);
  }
  return [];
};

export const parseEnvironment = (value: unknown): TemplateEnvVar[] => {
  if (Array.isArray(value)) {
    const vars: TemplateEnvVar[] = [];
    for (const entry of value) {
      const text = asText(entry);
      if (!text) continue;
      const idx = text.indexOf('=');
      vars.push(idx === -1 ? { name: text } : { name: text.slice(0, idx), default: text.slice(idx + 1) });
    }
    return vars;
  }
  if (isRecord(value)) {
    return Object.entries(value).map(([name, raw]) => {
      // `KEY:` with no value means "pass through from the host"
      const text = asText(raw);
      return text === undefined ? { name } : { name, default: text };
    });
  }
  return [];
};

/** Turns a compose port entry into a `{ "Port N": "N/proto" }` pair keyed by the container side. */
export const parsePortEntry = (value: unknown): TemplatePort | null => {
  if (isRecord(value)) {
    const target = asText(value.target);
    if (!target) return null;
    const protocol = asText(value.protocol) || 'tcp';
    return { [`Port ${target}`]: `${target}/${protocol}` };
  }

  const text = asText(value)?.trim();
  if (!text) return null;
  const slash = text.indexOf('/');
  const mapping = slash === -1 ? text : text.slice(0, slash);
  const protocol = slash === -1 ? 'tcp' : text.slice(slash + 1) || 'tcp';
  const segments = mapping.split(':');
  const containerPort = segments[segments.length - 1];
  if (!containerPort) return null;
  return { [`Port ${containerPort}`]: `${containerPort}/${protocol}` };
};

/** Named volumes and `./` paths are relocated under the managed data directory. */
export const relocateHostPath = (host: string): string => {
  if (host.startsWith('./')) return `${DATA_PREFIX}${host.slice(2)}`;
  if (!host.startsWith('/') && !host.startsWith('.')) return `${DATA_PREFIX}${host}`;
  return host;
};

export const parseVolumeEntry = (value: unknown): TemplateVolume | null => {
  if (isRecord(value)) {
    const source = asText(value.source);
    const target = asText(value.target);
    if (!source || !target) return null;
    const volume: TemplateVolume = { container: target, bind: relocateHostPath(source) };
    if (value.read_only === true) volume.readonly = true;
    return volume;
  }

  const text = asText(value)?.trim();
  if (!text) return null;
  const [host, container, mode] = text.split(':');
  if (!host || !container) return null;
  const volume: TemplateVolume = { container, bind: relocateHostPath(host) };
  if (mode?.split(',').includes('ro')) volume.readonly = true;
  return volume;
};

export const matchCategories = (serviceName: string, image: string): string[] => {
  const name = serviceName.toLowerCase();
  const imageRef = image.toLowerCase();
  const matched = categoryKeywords
    .filter(({ keywords }) => keywords.some((keyword) => name.includes(keyword) || imageRef.includes(keyword)))
    .map(({ category }) => category);
  return matched.length ? matched : [DEFAULT_CATEGORY];
};

const collectList = <T>(value: unknown, parse: (entry: unknown) => T | null): T[] => {
  if (!Array.isArray(value)) return [];
  return value.map(parse).filter((entry): entry is T => entry !== null);
};

/**
 * Maps one compose service onto a canonical template. Services without an
 * `image` cannot be deployed from a template and yield `null`.
 */
export const convertComposeService = (serviceName: string, service: JsonRecord): CanonicalTemplate | null => {
  const image = asText(service.image);
  if (!image) return null;

  const labels = readLabels(service.labels);
  const labelValue = (key: string) => labels.find(([name]) => name === key)?.[1];
  const restart = asText(service.restart) ?? '';

  const template: CanonicalTemplate = {
    title: toTitleCase((asText(service.container_name) || serviceName).replace(/_/g, ' ')),
    description:
      labelValue('description') || labelValue('traefik.frontend.rule') || `Container service: ${serviceName}`,
    image,
    categories: matchCategories(serviceName, image),
    restart_policy: isRestartPolicy(restart) ? restart : 'unless-stopped',
  };

  const env = parseEnvironment(service.environment);
  if (env.length) template.env = env;

  const ports = collectList(service.ports, parsePortEntry);
  if (ports.length) template.ports = ports;

  const volumes = collectList(service.volumes, parseVolumeEntry);
  if (volumes.length) template.volumes = volumes;

  const noteLabels = labels.filter(([key]) => key !== 'description').slice(0, MAX_NOTE_LABELS);
  if (noteLabels.length) {
    template.note = `Docker Compose labels: ${noteLabels.map(([key, value]) => `${key}: ${value}`).join(', ')}`;
  }

  return template;
};

export const convertComposeDocument = (doc: unknown): Result<TemplateCollection, ConversionError> => {
  if (!isRecord(doc) || !hasKey(doc, 'services')) {
    return err(new ConversionError('Docker Compose document has no services section', 'docker_compose'));
  }
  if (!isRecord(doc.services)) {
    return err(new ConversionError('Docker Compose services must be a mapping', 'docker_compose'));
  }

  const templates: CanonicalTemplate[] = [];
  for (const [serviceName, service] of Object.entries(doc.services)) {
    if (!isRecord(service)) continue;
    const template = convertComposeService(serviceName, service);
    if (template) templates.push(template);
  }

  return ok({ version: '2', templates });
};
