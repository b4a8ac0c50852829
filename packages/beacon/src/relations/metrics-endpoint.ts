import type { CharmBase } from '../ops';

export interface StaticScrapeConfig {
  targets: string[];
  labels?: Record<string, string>;
}

export interface ScrapeJob {
  job_name?: string;
  metrics_path?: string;
  static_configs: StaticScrapeConfig[];
}

export interface MetricsEndpointProviderOptions {
  /** Defaults to metrics-endpoint */
  relationName?: string;
  charmName: string;
  jobs: ScrapeJob[];
}

/**
 * Provider side of `prometheus_scrape`. Targets written as `*:<port>` are
 * expanded by Prometheus to every unit address published here.
 */
export class MetricsEndpointProvider {
  readonly relationName: string;

  constructor(
    private readonly charm: CharmBase,
    private readonly options: MetricsEndpointProviderOptions,
  ) {
    this.relationName = options.relationName ?? 'metrics-endpoint';
    charm.observeRelation(this.relationName, ['created', 'joined'], () => this.setScrapeJobSpec());
  }

  setScrapeJobSpec(): void {
    const { model } = this.charm;
    const address = this.charm.unitAddress(this.relationName);

    for (const relation of model.relations(this.relationName)) {
      if (address) {
        relation.updateLocalUnitData({
          prometheus_scrape_unit_address: address,
          prometheus_scrape_unit_name: model.unitName,
        });
      }
      if (!model.isLeader()) continue;
      relation.updateLocalAppData({
        scrape_metadata: JSON.stringify({
          model: model.name,
          model_uuid: model.uuid,
          application: model.appName,
          charm_name: this.options.charmName,
        }),
        scrape_jobs: JSON.stringify(this.options.jobs),
      });
    }
  }
}
