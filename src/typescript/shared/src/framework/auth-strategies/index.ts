export { ServiceTokenStrategy } from './service-token';
