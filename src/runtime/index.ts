export * from './decorators';
export { Cardinality, AttributeBuilder } from './attribute';
export type { Attribute, AttributeShape } from './attribute';
export { PropertyState } from './propertyState';
export type { PropertyStateAccessor } from './propertyState';
export { TypeBuilder, notifyListeners } from './type';
export type { LifecycleEvent, Type, TypeInfo, TypeListener } from './type';
export { createEntityModel } from './entityModel';
export type { EntityModel } from './entityModel';
export { valueEquals, hashValues, describeValue, describeEntity } from './values';
