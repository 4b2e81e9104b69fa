export { MissingRequiredAttributeError } from './missing-required-attribute.error';
