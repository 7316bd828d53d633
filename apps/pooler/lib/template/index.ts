export { TemplateCatalog } from './catalog'
export { PrototypeTemplate, type PrototypeResource } from './prototype'
