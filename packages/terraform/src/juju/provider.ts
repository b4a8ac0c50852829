import { TerraformProvider } from 'cdktf';
import { Construct } from 'constructs';

export interface JujuProviderConfig {
  /** Provider version constraint (defaults to ~> 0.19) */
  version?: string;
  /** Controller address, otherwise taken from the local juju client */
  controllerAddresses?: string;
  alias?: string;
}

/** The `juju/juju` provider; credentials come from the environment or the juju CLI. */
export class JujuProvider extends TerraformProvider {
  constructor(
    scope: Construct,
    id: string,
    private readonly settings: JujuProviderConfig = {},
  ) {
    super(scope, id, {
      terraformResourceType: 'juju',
      terraformGeneratorMetadata: {
        providerName: 'juju',
        providerVersionConstraint: settings.version ?? '~> 0.19',
      },
      terraformProviderSource: 'juju/juju',
    });
    this.alias = settings.alias;
  }

  protected synthesizeAttributes(): Record<string, unknown> {
    return {
      controller_addresses: this.settings.controllerAddresses,
      alias: this.alias,
    };
  }
}
