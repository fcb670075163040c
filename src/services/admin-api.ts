import { Injector } from 'reduct'
import { Server, IncomingMessage, ServerResponse } from 'http'
import Config from './config'
import SessionPool from './session-pool'
import Stats from './stats'
import Validator from './validator'
import VrpStore from './vrp-store'
import { formatVrpAsJson } from '../routing/utils'
import { AddressFamily, parseCidr } from '../lib/ip'
import { Vrp } from '../types/vrp'
import { parseUnsigned } from '../lib/utils'
import InvalidRouteError from '../errors/invalid-route-error'
import StalenessExceededError from '../errors/staleness-exceeded-error'
import { create as createLogger, formatError } from '../common/log'
const log = createLogger('admin-api')

interface Route {
  method: 'GET'
  match: RegExp
  fn: (url: URL, params: string[]) => Promise<object | string>
  responseType?: string
}

export interface AdminResponse {
  statusCode: number
  contentType: string
  body: string
}

export default class AdminApi {
  private config: Config
  private pool: SessionPool
  private stats: Stats
  private store: VrpStore
  private validator: Validator

  private server?: Server
  private routes: Route[]

  constructor (deps: Injector) {
    this.config = deps(Config)
    this.pool = deps(SessionPool)
    this.stats = deps(Stats)
    this.store = deps(VrpStore)
    this.validator = deps(Validator)

    this.routes = [
      { method: 'GET', match: /^\/status$/, fn: this.getStatus },
      { method: 'GET', match: /^\/validate$/, fn: this.getValidation },
      { method: 'GET', match: /^\/vrps$/, fn: this.getVrps },
      { method: 'GET', match: /^\/origins\/(4|6)$/, fn: this.getOrigins },
      { method: 'GET', match: /^\/covered\/(4|6)$/, fn: this.getCovered },
      { method: 'GET', match: /^\/stats$/, fn: this.getStats },
      { method: 'GET', match: /^\/metrics$/, fn: this.getMetrics, responseType: this.stats.getContentType() }
    ]
  }

  listen () {
    const { adminApi, adminApiHost, adminApiPort } = this.config

    if (adminApi) {
      log.info('admin api listening. host=%s port=%s', adminApiHost, adminApiPort)
      this.server = new Server()
      this.server.listen(adminApiPort, adminApiHost)
      this.server.on('request', (req: IncomingMessage, res: ServerResponse) => {
        this.handleRequest(req, res).catch((err: unknown) => {
          log.warn('error in admin api request handler. error=%s', formatError(err))
          res.statusCode = 500
          res.setHeader('Content-Type', 'text/plain')
          res.end(String(err))
        })
      })
    }
  }

  close (): Promise<void> {
    const server = this.server
    this.server = undefined
    if (!server) {
      return Promise.resolve()
    }
    return new Promise<void>((resolve, reject) => {
      server.close(err => err ? reject(err) : resolve())
    })
  }

  /**
   * Answer one request. Errors carrying an HTTP status become that status,
   * anything else is a 500.
   */
  async dispatch (method: string, rawUrl: string): Promise<AdminResponse> {
    const url = new URL(rawUrl, 'http://localhost')
    for (const route of this.routes) {
      const match = route.match.exec(url.pathname)
      if (route.method !== method || !match) continue

      try {
        const body = await route.fn.call(this, url, match.slice(1))
        if (typeof body === 'string') {
          return { statusCode: 200, contentType: route.responseType || 'text/plain', body }
        }
        return { statusCode: 200, contentType: 'application/json', body: JSON.stringify(body) }
      } catch (err) {
        const statusCode = getHttpErrorCode(err)
        if (statusCode === 500) {
          log.warn('admin api request failed. url=%s error=%s', rawUrl, formatError(err))
        }
        return {
          statusCode,
          contentType: 'application/json',
          body: JSON.stringify({ error: err instanceof Error ? err.message : String(err) })
        }
      }
    }

    return { statusCode: 404, contentType: 'text/plain', body: 'Not Found' }
  }

  private async handleRequest (req: IncomingMessage, res: ServerResponse) {
    const response = await this.dispatch(req.method || 'GET', req.url || '/')
    res.statusCode = response.statusCode
    res.setHeader('Content-Type', response.contentType)
    res.end(response.body)
  }

  private async getStatus () {
    return this.pool.getStatus()
  }

  private async getValidation (url: URL) {
    const prefix = url.searchParams.get('prefix')
    if (!prefix) {
      throw new InvalidRouteError('missing query parameter. name=prefix')
    }
    const asnParam = url.searchParams.get('asn') || ''
    const asn = parseUnsigned(asnParam.replace(/^AS/i, ''))
    if (asn === undefined) {
      throw new InvalidRouteError('invalid asn. asn=' + asnParam)
    }

    const route = parseCidr(prefix)
    const result = this.validator.validate(route.address, route.length, asn)
    return {
      route: { prefix: `${route.address}/${route.length}`, asn: 'AS' + asn },
      state: result.state,
      version: this.store.getVersion(),
      covering: result.covering.map(formatVrpAsJson),
      matched: result.matched.map(formatVrpAsJson)
    }
  }

  private async getVrps (url: URL) {
    const familyParam = url.searchParams.get('family')
    const asnParam = url.searchParams.get('asn')
    const family = familyParam === null ? undefined : parseFamily(familyParam)
    const snapshot = this.store.current()

    let vrps: Vrp[]
    if (asnParam === null) {
      vrps = Array.from(snapshot.vrps(family))
    } else {
      const asn = parseUnsigned(asnParam.replace(/^AS/i, ''))
      if (asn === undefined) {
        throw new InvalidRouteError('invalid asn. asn=' + asnParam)
      }
      vrps = snapshot.forOrigin(asn, family)
    }

    return {
      version: snapshot.version,
      available: this.store.isAvailable(),
      vrps: vrps.map(formatVrpAsJson)
    }
  }

  private async getOrigins (url: URL, [family]: string[]) {
    return this.store.current().origins(parseFamily(family))
  }

  private async getCovered (url: URL, [family]: string[]) {
    return this.store.current().covered(parseFamily(family))
  }

  private async getStats () {
    return this.stats.getStatus()
  }

  private async getMetrics () {
    return this.stats.getMetrics()
  }
}

function parseFamily (text: string): AddressFamily {
  if (text === '4') return 4
  if (text === '6') return 6
  throw new InvalidRouteError('invalid address family. family=' + text)
}

function getHttpErrorCode (err: unknown): number {
  if (err instanceof InvalidRouteError || err instanceof StalenessExceededError) {
    return err.httpErrorCode
  }
  return 500
}
