export { CHARM_NAME, IstioBeaconModule } from './module';
export type { IstioBeaconModuleConfig } from './module';
export { JujuApplication } from './juju/application';
export type { JujuApplicationConfig, JujuCharm } from './juju/application';
export { JujuProvider } from './juju/provider';
export type { JujuProviderConfig } from './juju/provider';
