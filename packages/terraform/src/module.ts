/**
 * IstioBeaconModule - Terraform module deploying istio-beacon-k8s
 *
 * Inputs are Terraform variables so the synthesized module can be consumed
 * from plain HCL; the defaults below are the variable defaults.
 */
import { TerraformOutput, TerraformStack, TerraformVariable } from 'cdktf';
import { Construct } from 'constructs';
import { JujuApplication } from './juju/application';
import { JujuProvider, type JujuProviderConfig } from './juju/provider';

export const CHARM_NAME = 'istio-beacon-k8s';

export interface IstioBeaconModuleConfig {
  /** Application name (defaults to istio-beacon) */
  appName?: string;
  /** Charm channel (defaults to 2/edge) */
  channel?: string;
  /** Constraints (defaults to arch=amd64) */
  constraints?: string;
  /** Unit count (defaults to 1) */
  units?: number;
  provider?: JujuProviderConfig;
}

export class IstioBeaconModule extends TerraformStack {
  public readonly application: JujuApplication;

  constructor(
    scope: Construct,
    id: string,
    public readonly config: IstioBeaconModuleConfig = {},
  ) {
    super(scope, id);

    new JujuProvider(this, 'juju', config.provider);

    // --- Inputs ---
    const appName = new TerraformVariable(this, 'app_name', {
      type: 'string',
      default: config.appName ?? 'istio-beacon',
      description: 'Name to give the deployed application',
    });
    const channel = new TerraformVariable(this, 'channel', {
      type: 'string',
      default: config.channel ?? '2/edge',
      description: 'Channel that the charm is deployed from',
    });
    const charmConfig = new TerraformVariable(this, 'config', {
      type: 'map(string)',
      default: {},
      description: 'Map of the charm configuration options',
    });
    const constraints = new TerraformVariable(this, 'constraints', {
      type: 'string',
      default: config.constraints ?? 'arch=amd64',
      description: 'String listing constraints for the application',
    });
    const model = new TerraformVariable(this, 'model', {
      type: 'string',
      description: 'Reference to an existing model resource or data source for the model to deploy to',
    });
    const revision = new TerraformVariable(this, 'revision', {
      type: 'number',
      nullable: true,
      description: 'Revision number of the charm',
    });
    // a null default is dropped by synth, so it is set on the raw block
    revision.addOverride('default', null);
    const storageDirectives = new TerraformVariable(this, 'storage_directives', {
      type: 'map(string)',
      default: {},
      description: 'Map of storage used by the application, which defaults to 1 GB, allocated by Juju',
    });
    const units = new TerraformVariable(this, 'units', {
      type: 'number',
      default: config.units ?? 1,
      description: 'Unit count/scale',
    });

    // --- Application ---
    this.application = new JujuApplication(this, 'istio_beacon', {
      name: appName.stringValue,
      model: model.stringValue,
      trust: true,
      charm: { name: CHARM_NAME, channel: channel.stringValue, revision: revision.numberValue },
      config: charmConfig.value,
      constraints: constraints.stringValue,
      storageDirectives: storageDirectives.value,
      units: units.numberValue,
    });

    // --- Outputs ---
    // construct ids are shared with the variables, output names are not
    new TerraformOutput(this, 'app_name_output', { value: this.application.nameOutput }).overrideLogicalId('app_name');
    new TerraformOutput(this, 'endpoints', {
      value: {
        service_mesh: 'service-mesh',
        metrics_endpoint: 'metrics-endpoint',
        charm_tracing: 'charm-tracing',
      },
    });
  }
}
