import { App } from 'cdktf';
import { IstioBeaconModule } from './module';

const app = new App();

new IstioBeaconModule(app, 'istio-beacon-k8s');

app.synth();
