import { describe, it, expect, vi, afterEach } from 'vitest';
import { renderAccessInfo, summarizeAccess } from '../services/access.service';

const options = { domain: 'n8n.example.com', localPort: 5678 };

describe('summarizeAccess', () => {
  it('should use the domain and add the qdrant subdomain when both are selected', () => {
    expect(summarizeAccess(new Set(['traefik', 'qdrant']), options)).toEqual([
      { label: 'n8n', url: 'https://n8n.example.com' },
      { label: 'Qdrant', url: 'https://qdrant.n8n.example.com' },
    ]);
  });

  it('should only list n8n behind traefik when qdrant is not selected', () => {
    expect(summarizeAccess(new Set(['traefik', 'postgres']), options)).toEqual([
      { label: 'n8n', url: 'https://n8n.example.com' },
    ]);
  });

  it('should fall back to the local port without traefik', () => {
    expect(summarizeAccess(new Set(['postgres']), options)).toEqual([
      { label: 'n8n', url: 'http://localhost:5678' },
    ]);
  });

  it('should ignore qdrant without traefik', () => {
    expect(summarizeAccess(new Set(['qdrant']), { domain: 'example.org', localPort: 8080 })).toEqual([
      { label: 'n8n', url: 'http://localhost:8080' },
    ]);
  });

  it('should return equal output for equal selections', () => {
    const first = summarizeAccess(new Set(['qdrant', 'traefik']), options);
    const second = summarizeAccess(new Set(['traefik', 'qdrant']), options);
    expect(second).toEqual(first);
    expect(second).not.toBe(first);
  });
});

describe('renderAccessInfo', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should print one bullet per entry', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    renderAccessInfo([
      { label: 'n8n', url: 'https://n8n.example.com' },
      { label: 'Qdrant', url: 'https://qdrant.n8n.example.com' },
    ]);

    expect(log.mock.calls.map((call) => call[0])).toEqual([
      '\n  Access your services at:',
      '    • n8n: https://n8n.example.com',
      '    • Qdrant: https://qdrant.n8n.example.com',
      '',
    ]);
  });
});
