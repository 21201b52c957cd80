/**
 * Driver Registry.
 *
 * Built once at process start from an explicit list of registrations and
 * frozen afterwards: there is no runtime discovery and no late
 * registration. Answers which driver serves an id and whether it supports
 * a capability.
 *
 * Usage:
 *   const registry = new DriverRegistry([
 *     { id: 'hetzner-cloud', driver: hetznerDriver },
 *     { id: 'pterodactyl', driver: pteroDriver, requiresCredential: false },
 *   ]);
 *
 *   registry.supports('pterodactyl', 'webhooks');   // false → poll-only
 *   const hooks = registry.requireCapability('hetzner-cloud', 'webhooks');
 */

import {
  Capability,
  CapabilityFacets,
  Driver,
  Provider,
} from './driver';
import {
  OrchestratorError,
  capabilityUnsupportedError,
  configError,
  driverNotRegisteredError,
} from '../domain/errors';

export interface DriverRegistration {
  /** Identifier resources and plan maps refer to. */
  id: string;
  driver: Driver;
  /** Whether calls need a vault credential. Default: true. */
  requiresCredential?: boolean;
}

export interface RegisteredDriver {
  readonly id: string;
  readonly driver: Driver;
  readonly requiresCredential: boolean;
}

/** Public description of a driver, safe to expose over the API. */
export interface DriverDescriptor {
  id: string;
  name: string;
  type: Provider['type'];
  capabilities: Capability[];
}

const OPTIONAL_FACETS = ['metrics', 'inventory', 'webhooks'] as const;

export class DriverRegistry {
  private readonly entries: ReadonlyMap<string, RegisteredDriver>;

  constructor(registrations: readonly DriverRegistration[]) {
    const entries = new Map<string, RegisteredDriver>();
    for (const registration of registrations) {
      if (entries.has(registration.id)) {
        throw new OrchestratorError(
          configError(`Driver "${registration.id}" is registered twice`),
        );
      }
      assertFacetsMatchCapabilities(registration.id, registration.driver);
      entries.set(
        registration.id,
        Object.freeze({
          id: registration.id,
          driver: registration.driver,
          requiresCredential: registration.requiresCredential ?? true,
        }),
      );
    }
    this.entries = entries;
    Object.freeze(this);
  }

  has(driverId: string): boolean {
    return this.entries.has(driverId);
  }

  /** Get a registered driver or throw DRIVER.NOT_REGISTERED. */
  require(driverId: string): RegisteredDriver {
    const entry = this.entries.get(driverId);
    if (!entry) {
      throw new OrchestratorError(driverNotRegisteredError(driverId));
    }
    return entry;
  }

  /** Whether a registered driver declares a capability. Unknown drivers support nothing. */
  supports(driverId: string, capability: Capability): boolean {
    const entry = this.entries.get(driverId);
    return entry ? entry.driver.capabilities.has(capability) : false;
  }

  /**
   * Get the facet for a capability, or throw
   * CONTRACT.CAPABILITY_UNSUPPORTED when the driver does not declare it.
   */
  requireCapability<C extends Capability>(driverId: string, capability: C): CapabilityFacets[C] {
    const { driver } = this.require(driverId);
    if (!driver.capabilities.has(capability)) {
      throw new OrchestratorError(capabilityUnsupportedError(driverId, capability));
    }
    const facets: { [K in Capability]: CapabilityFacets[K] | undefined } = {
      provisioner: driver,
      metrics: driver.metrics,
      inventory: driver.inventory,
      webhooks: driver.webhooks,
    };
    const facet = facets[capability];
    if (!facet) {
      throw new OrchestratorError(capabilityUnsupportedError(driverId, capability));
    }
    return facet;
  }

  describe(driverId: string): DriverDescriptor {
    const { id, driver } = this.require(driverId);
    return {
      id,
      name: driver.name,
      type: driver.type,
      capabilities: [...driver.capabilities].sort(),
    };
  }

  list(): DriverDescriptor[] {
    return [...this.entries.keys()].map((id) => this.describe(id));
  }
}

/**
 * A driver's declared capabilities and the facets it exposes must agree,
 * so that `supports()` alone decides whether a facet call is legal.
 */
function assertFacetsMatchCapabilities(driverId: string, driver: Driver): void {
  if (!driver.capabilities.has('provisioner')) {
    throw new OrchestratorError(
      configError(`Driver "${driverId}" must declare the provisioner capability`),
    );
  }
  for (const facet of OPTIONAL_FACETS) {
    const declared = driver.capabilities.has(facet);
    const present = driver[facet] !== undefined;
    if (declared !== present) {
      throw new OrchestratorError(
        configError(
          declared
            ? `Driver "${driverId}" declares ${facet} but does not implement it`
            : `Driver "${driverId}" implements ${facet} without declaring it`,
          { driverId, facet },
        ),
      );
    }
  }
}
