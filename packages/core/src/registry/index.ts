export {
    WRAPPER_FORMS, isWrapperOrigin, wrapperKindOf,
    CONTAINER_TABLE, CONTAINER_CONSTRUCTORS,
    lookupContainerKind, containerConstructorOf, instantiateContainer,
} from './WrapperRegistry.js';
export type { WrapperKind, ContainerKind, ContainerInstances } from './WrapperRegistry.js';
