import { describe, expect, it } from 'vitest';
import {
  convertComposeDocument,
  convertComposeService,
  matchCategories,
  parseEnvironment,
  parsePortEntry,
  parseVolumeEntry,
  relocateHostPath,
  toTitleCase,
} from '../converters/compose';

describe('toTitleCase', () => {
  it('capitalizes every run of letters', () => {
    expect(toTitleCase('my web-app')).toBe('My Web-App');
    expect(toTitleCase('app2go')).toBe('App2Go');
    expect(toTitleCase('HOME assistant')).toBe('Home Assistant');
    expect(toTitleCase('éclair service')).toBe('Éclair Service');
    expect(toTitleCase('straße_café')).toBe('Straße_Café');
  });
});

describe('parseEnvironment', () => {
  it('reads list entries with and without values', () => {
    expect(parseEnvironment(['A=1', 'B', 'C=x=y'])).toEqual([
      { name: 'A', default: '1' },
      { name: 'B' },
      { name: 'C', default: 'x=y' },
    ]);
  });

  it('stringifies mapping values and keeps bare names for empty ones', () => {
    expect(parseEnvironment({ A: 1, B: null, C: true })).toEqual([
      { name: 'A', default: '1' },
      { name: 'B' },
      { name: 'C', default: 'true' },
    ]);
  });

  it('ignores anything else', () => {
    expect(parseEnvironment('A=1')).toEqual([]);
  });
});

describe('parsePortEntry', () => {
  it('keys ports by the container side', () => {
    expect(parsePortEntry('8080:80')).toEqual({ 'Port 80': '80/tcp' });
    expect(parsePortEntry('127.0.0.1:53:53/udp')).toEqual({ 'Port 53': '53/udp' });
    expect(parsePortEntry(9000)).toEqual({ 'Port 9000': '9000/tcp' });
    expect(parsePortEntry({ target: 443, published: 8443, protocol: 'tcp' })).toEqual({ 'Port 443': '443/tcp' });
  });

  it('rejects empty entries', () => {
    expect(parsePortEntry('')).toBeNull();
    expect(parsePortEntry({ published: 80 })).toBeNull();
  });
});

describe('volumes', () => {
  it('relocates named volumes and ./ paths under the data prefix', () => {
    expect(relocateHostPath('./config')).toBe('!data/config');
    expect(relocateHostPath('dbdata')).toBe('!data/dbdata');
    expect(relocateHostPath('/srv/media')).toBe('/srv/media');
    expect(relocateHostPath('../shared')).toBe('../shared');
  });

  it('reads short and long volume syntax', () => {
    expect(parseVolumeEntry('./config:/config:ro')).toEqual({ container: '/config', bind: '!data/config', readonly: true });
    expect(parseVolumeEntry('/srv/media:/media')).toEqual({ container: '/media', bind: '/srv/media' });
    expect(parseVolumeEntry({ source: 'dbdata', target: '/var/lib/mysql', read_only: true })).toEqual({
      container: '/var/lib/mysql',
      bind: '!data/dbdata',
      readonly: true,
    });
  });

  it('skips volumes without a host side', () => {
    expect(parseVolumeEntry('/data')).toBeNull();
    expect(parseVolumeEntry({ type: 'tmpfs', target: '/tmp' })).toBeNull();
  });
});

describe('matchCategories', () => {
  it('collects one category per matching keyword set in table order', () => {
    expect(matchCategories('gitea_db', 'gitea/gitea')).toEqual(['database', 'development']);
    expect(matchCategories('pihole', 'pihole/pihole:latest')).toEqual(['networking']);
  });

  it('falls back to tools', () => {
    expect(matchCategories('app', 'example/app')).toEqual(['tools']);
  });
});

describe('convertComposeService', () => {
  it('maps a full service', () => {
    const template = convertComposeService('nextcloud_app', {
      container_name: 'my_cloud',
      image: 'nextcloud:28',
      restart: 'always',
      environment: { MYSQL_HOST: 'db' },
      ports: ['8080:80'],
      volumes: ['nc_data:/var/www/html', '/data'],
      labels: {
        description: 'Private cloud',
        'com.example.tier': 'frontend',
        'traefik.enable': 'true',
        'com.example.team': 'ops',
        'com.example.extra': 'x',
      },
    });

    expect(template).toEqual({
      title: 'My Cloud',
      description: 'Private cloud',
      image: 'nextcloud:28',
      categories: ['storage'],
      restart_policy: 'always',
      env: [{ name: 'MYSQL_HOST', default: 'db' }],
      ports: [{ 'Port 80': '80/tcp' }],
      volumes: [{ container: '/var/www/html', bind: '!data/nc_data' }],
      note: 'Docker Compose labels: com.example.tier: frontend, traefik.enable: true, com.example.team: ops',
    });
  });

  it('falls back to the traefik rule and to a default restart policy', () => {
    const template = convertComposeService('proxy', {
      image: 'traefik:v1.7',
      restart: 'sometimes',
      labels: ['traefik.frontend.rule=Host:example.com'],
    });

    expect(template).toEqual({
      title: 'Proxy',
      description: 'Host:example.com',
      image: 'traefik:v1.7',
      categories: ['webserver', 'networking'],
      restart_policy: 'unless-stopped',
      note: 'Docker Compose labels: traefik.frontend.rule: Host:example.com',
    });
  });

  it('synthesizes a description from the service name', () => {
    expect(convertComposeService('worker', { image: 'example/worker' })?.description).toBe('Container service: worker');
  });

  it('returns null without an image', () => {
    expect(convertComposeService('builder', { build: '.' })).toBeNull();
  });
});

describe('convertComposeDocument', () => {
  it('skips services that are not mappings', () => {
    const result = convertComposeDocument({ services: { web: { image: 'nginx' }, broken: 'nginx' } });
    expect(result.ok && result.value.templates).toHaveLength(1);
  });
});
