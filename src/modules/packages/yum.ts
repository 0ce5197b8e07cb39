import { buildContext, type ContextOptions } from "../../core/context.js";
import {
  PackageManager,
  type PackageManagerConfig,
} from "../../core/package-manager.js";
import type { PackageManagerContext } from "../../core/types.js";

/**
 * YUM package manager for RHEL, CentOS, Fedora and Amazon Linux.
 * Queries the RPM database directly for installed packages.
 */
export class YumPackageManager extends PackageManager {
  protected readonly config: PackageManagerConfig = {
    name: "YUM",
    command: this.ctx.settings.yumBin,
    queryCommand: this.ctx.settings.rpmBin,
    // check-update exits 100 when updates are available
    checkUpdateCodes: [0, 100],
  };

  constructor(ctx: PackageManagerContext) {
    super(
      {
        id: "packages:yum",
        description: "YUM package manager for RPM-based Linux",
      },
      ctx,
    );
  }
}

/**
 * Creates a YUM package manager wired to the local host.
 */
export function createYumPackageManager(options: ContextOptions = {}): YumPackageManager {
  return new YumPackageManager(buildContext(options));
}
