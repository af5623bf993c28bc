export { Account } from './account'
export type { AccountOptions, TestOptions, ListTestsQuery } from './account'
export { Test } from './page-test'
export type { FetchOptions } from './page-test'
export { Report } from './report'
export { Requestor, JSON_API_MEDIA_TYPE } from './requestor'
export type { FetchFunction, HttpRequestInit, HttpResponse, TransportOptions, RequestOptions } from './requestor'
export { resourceKey, resourceUrl } from './resource'
export type { ResourceRef, ResourceDestination } from './resource'
export type { ClientContext } from './context'
