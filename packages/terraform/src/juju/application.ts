import { TerraformResource, type TerraformMetaArguments } from 'cdktf';
import { Construct } from 'constructs';

export interface JujuCharm {
  name: string;
  channel?: string;
  revision?: number;
  base?: string;
}

export interface JujuApplicationConfig extends TerraformMetaArguments {
  name: string;
  model: string;
  charm: JujuCharm;
  units?: number;
  trust?: boolean;
  config?: Record<string, string>;
  constraints?: string;
  storageDirectives?: Record<string, string>;
}

/** `juju_application`: one deployed charm. */
export class JujuApplication extends TerraformResource {
  static readonly tfResourceType = 'juju_application';

  constructor(
    scope: Construct,
    id: string,
    private readonly application: JujuApplicationConfig,
  ) {
    super(scope, id, {
      terraformResourceType: JujuApplication.tfResourceType,
      terraformGeneratorMetadata: { providerName: 'juju' },
      provider: application.provider,
      dependsOn: application.dependsOn,
      count: application.count,
      lifecycle: application.lifecycle,
      forEach: application.forEach,
    });
  }

  /** Deployed application name, known after apply. */
  get nameOutput(): string {
    return this.getStringAttribute('name');
  }

  protected synthesizeAttributes(): Record<string, unknown> {
    const { charm } = this.application;
    return {
      name: this.application.name,
      model: this.application.model,
      charm: { name: charm.name, channel: charm.channel, revision: charm.revision, base: charm.base },
      units: this.application.units,
      trust: this.application.trust,
      config: this.application.config,
      constraints: this.application.constraints,
      storage_directives: this.application.storageDirectives,
    };
  }
}
