// Request core
export { ConnectionScope, RequestScope, withRequestScope } from './core/ConnectionScope'
export { ResourceTracker, ResourceTrackerError, Releasable, DrainSummary } from './core/ResourceTracker'
export { DomainLookup } from './core/DomainLookup'
export { DescriptorBuilder } from './core/DescriptorBuilder'
export { ActionDispatcher } from './core/ActionDispatcher'

// Hypervisor clients
export { VirshClient, VirshClientOptions, DEFAULT_VIRSH_BINARY } from './core/VirshClient'

// Parsing
export { DomainXmlParser } from './parser/DomainXmlParser'

// HTTP
export { buildServer, ServerOptions, ROUTE_NOT_FOUND_CODE } from './api/server'
export {
  DomainHandlers,
  DomainHandlersOptions,
  HandlerResponse,
  ErrorBody,
  toErrorResponse,
  INTERNAL_ERROR_CODE
} from './api/DomainHandlers'

// Configuration
export {
  ServerConfig,
  ConfigError,
  loadServerConfig,
  DEFAULT_HYPERVISOR_URI,
  DEFAULT_HOST,
  DEFAULT_PORT
} from './config/ServerConfig'

// Types - Hypervisor
export {
  DomainHandle,
  HypervisorConnection,
  HypervisorClient,
  HypervisorErrorCode,
  HypervisorError,
  isHypervisorError
} from './types/hypervisor.types'

// Types - Domain
export {
  DiskDriver,
  DiskSource,
  DiskTarget,
  DomainDisk,
  InterfaceSource,
  InterfaceMac,
  InterfaceModel,
  FilterRefParameter,
  FilterRef,
  DomainInterface,
  DomainDevices,
  OsType,
  OsBoot,
  DomainOs,
  DomainState,
  DomainDefinition,
  DomainDescriptor,
  DomainAction,
  DOMAIN_STATES,
  DOMAIN_ACTIONS,
  mapDomainState,
  isDomainAction
} from './types/domain.types'

// Types - Errors
export {
  DomainErrorCode,
  DomainError,
  ConnectionError,
  NotFoundError,
  DescriptorError,
  StateMappingError,
  ActionError,
  isDomainError,
  errorMessage
} from './types/errors.types'

// Utilities
export { Debugger } from './utils/debug'
export { CommandExecutor, CommandError, CommandRunner } from './utils/commandExecutor'
