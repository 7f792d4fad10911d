import type { CanonicalTemplate } from '../../../shared/types';
import { asText, type JsonRecord } from '../../utils/records';

const ARCH_PLATFORMS: Record<string, string> = {
  amd64: 'linux',
  arm64: 'linux',
  arm: 'linux',
  '386': 'linux',
  x86_64: 'linux',
};

// Architectures that get a "(arch)" title suffix so QNAP variants don't collide on title.
const SUFFIXED_ARCHES = new Set(['arm64', 'arm', '386']);

export const convertQnapTemplate = (entry: JsonRecord): CanonicalTemplate => {
  const template: CanonicalTemplate = { title: asText(entry.displayName) ?? '' };

  const description = asText(entry.description);
  if (description !== undefined) template.description = description;

  const name = asText(entry.name);
  if (name !== undefined) {
    const version = asText(entry.version);
    template.image = version !== undefined ? `${name}:${version}` : name;
  }

  const icon = asText(entry.icon);
  if (icon !== undefined) template.logo = icon;

  const type = asText(entry.type);
  if (type !== undefined) template.categories = [type];

  const arch = asText(entry.arch);
  if (arch !== undefined) {
    template.platform = ARCH_PLATFORMS[arch] ?? 'linux';
    if (SUFFIXED_ARCHES.has(arch)) {
      template.title = `${template.title} (${arch})`;
    }
  }

  const location = asText(entry.location);
  if (location !== undefined) {
    const qcsVersion = asText(entry.qcsVersion);
    template.note = qcsVersion !== undefined
      ? `Source: ${location} (QCS Version: ${qcsVersion})`
      : `Source: ${location}`;
  }

  template.restart_policy = 'unless-stopped';

  if (entry.repository === 'dockerhub' && location !== undefined) {
    template.repository = { url: location, stackfile: '' };
  }

  return template;
};
