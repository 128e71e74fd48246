export { KitchenModule } from './kitchen.module';
