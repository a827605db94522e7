import { parseDebLine, providesRepository, repositoryLines, toDistroRepository } from '../../../src/distro/repositories.js';
import { ReconcileError, ReconcileErrorCode } from '../../../src/shared/errors.js';

function errorOf(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

describe('repositoryLines', () => {
  it('gives the rolling line for kali', () => {
    expect(repositoryLines({ kind: 'kali' })).toEqual([
      'deb http://http.kali.org/kali kali-rolling main contrib non-free non-free-firmware',
    ]);
  });

  it('gives release, updates and security lines for debian', () => {
    expect(repositoryLines({ kind: 'debian', codename: 'trixie' })).toEqual([
      'deb http://deb.debian.org/debian trixie main contrib non-free non-free-firmware',
      'deb http://deb.debian.org/debian trixie-updates main contrib non-free non-free-firmware',
      'deb http://security.debian.org/debian-security trixie-security main contrib non-free non-free-firmware',
    ]);
  });

  it('gives release, updates and security lines for ubuntu', () => {
    expect(repositoryLines({ kind: 'ubuntu', codename: 'noble' })).toEqual([
      'deb http://archive.ubuntu.com/ubuntu noble main restricted universe multiverse',
      'deb http://archive.ubuntu.com/ubuntu noble-updates main restricted universe multiverse',
      'deb http://security.ubuntu.com/ubuntu noble-security main restricted universe multiverse',
    ]);
  });
});

describe('toDistroRepository', () => {
  it('needs no codename for kali', () => {
    expect(toDistroRepository('kali', 'ignored')).toEqual({ kind: 'kali' });
  });

  it('carries the codename for debian and ubuntu', () => {
    expect(toDistroRepository('ubuntu', 'jammy')).toEqual({ kind: 'ubuntu', codename: 'jammy' });
  });

  it('rejects debian without a codename', () => {
    expect(() => toDistroRepository('debian')).toThrow(ReconcileError);
    expect(() => toDistroRepository('debian')).toThrow('A codename is required for debian');
  });

  it('uses the unsupported-distro code', () => {
    expect(errorOf(() => toDistroRepository('ubuntu'))).toMatchObject({ code: ReconcileErrorCode.UNSUPPORTED_DISTRO });
  });
});

describe('parseDebLine', () => {
  it('skips an options block and a trailing comment', () => {
    expect(parseDebLine('deb [arch=amd64 signed-by=/etc/apt/keyrings/x.gpg] https://example.org/debian bookworm main contrib # mirror')).toEqual({
      uri: 'https://example.org/debian',
      suite: 'bookworm',
      components: ['main', 'contrib'],
    });
  });

  it('returns null for anything but a deb entry', () => {
    expect(parseDebLine('deb-src http://example.org/debian bookworm main')).toBeNull();
    expect(parseDebLine('# deb http://example.org/debian bookworm main')).toBeNull();
    expect(parseDebLine('deb http://example.org/debian')).toBeNull();
    expect(parseDebLine('')).toBeNull();
  });
});

describe('providesRepository', () => {
  const [release, updates] = repositoryLines({ kind: 'debian', codename: 'bookworm' });

  it('accepts a mirror of the same archive and suite with fewer components', () => {
    expect(providesRepository('deb https://mirror.example.org/debian/ bookworm main', release ?? '')).toBe(true);
  });

  it('rejects another suite, another archive or disjoint components', () => {
    expect(providesRepository('deb http://deb.debian.org/debian bookworm main', updates ?? '')).toBe(false);
    expect(providesRepository('deb https://download.example.org/linux/prod bookworm main', release ?? '')).toBe(false);
    expect(providesRepository('deb https://download.example.org/linux/debian bookworm stable', release ?? '')).toBe(false);
  });
});
