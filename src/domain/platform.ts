/**
 * Build target descriptor.
 *
 * Identifiers follow the Go toolchain (`amd64`, `386`, `arm`, `linux`,
 * `android`, `nacl`), since they are written verbatim into GOOS/GOARCH.
 */
export interface Platform {
  readonly os: string;
  readonly arch: string;
  /** ARM revision such as `v7`; absent for other architectures */
  readonly subArch?: string;
}

export type HostPlatform = Omit<Platform, 'subArch'>;

/** Renders `<arch><subArch>-<os>`, e.g. `armv7-android`. */
export function formatPlatform(platform: Platform): string {
  return `${platform.arch}${platform.subArch ?? ''}-${platform.os}`;
}

const NODE_ARCH_TO_GOARCH: Readonly<Record<string, string>> = {
  x64: 'amd64',
  ia32: '386',
  arm: 'arm',
  arm64: 'arm64',
  ppc64: 'ppc64le',
  s390x: 's390x',
};

const NODE_PLATFORM_TO_GOOS: Readonly<Record<string, string>> = {
  win32: 'windows',
};

export interface ProcessIdentity {
  readonly platform: string;
  readonly arch: string;
}

/**
 * Host platform of the running process, in toolchain identifiers.
 * Unknown Node values pass through unchanged.
 */
export function hostPlatform(proc: ProcessIdentity): HostPlatform {
  return {
    os: NODE_PLATFORM_TO_GOOS[proc.platform] ?? proc.platform,
    arch: NODE_ARCH_TO_GOARCH[proc.arch] ?? proc.arch,
  };
}

export function isHost(platform: Platform, host: HostPlatform): boolean {
  return platform.arch === host.arch && platform.os === host.os;
}
