import * as Prometheus from 'prom-client'
import { PduType } from '../types/pdu'

export type SessionErrorKind = 'transport' | 'protocol' | 'cache'

export default class Stats {
  public pdusReceived: Prometheus.Counter<'cache' | 'type'>
  public sessionErrors: Prometheus.Counter<'cache' | 'kind'>
  public sessionCommits: Prometheus.Counter<'cache' | 'kind'>
  public sessionVrps: Prometheus.Gauge<'cache'>
  public sessionSerial: Prometheus.Gauge<'cache'>
  public publishedVersion: Prometheus.Gauge
  public validations: Prometheus.Counter<'state'>
  private registry: Prometheus.Registry

  constructor () {
    this.registry = new Prometheus.Registry()

    this.pdusReceived = new Prometheus.Counter<'cache' | 'type'>({
      name: 'rtr_pdus_received_total',
      help: 'Total number of PDUs received from caches',
      labelNames: ['cache', 'type'],
      registers: [this.registry]
    })

    this.sessionErrors = new Prometheus.Counter<'cache' | 'kind'>({
      name: 'rtr_session_errors_total',
      help: 'Total number of session failures',
      labelNames: ['cache', 'kind'],
      registers: [this.registry]
    })

    this.sessionCommits = new Prometheus.Counter<'cache' | 'kind'>({
      name: 'rtr_session_commits_total',
      help: 'Total number of committed transfers',
      labelNames: ['cache', 'kind'],
      registers: [this.registry]
    })

    this.sessionVrps = new Prometheus.Gauge<'cache'>({
      name: 'rtr_session_vrps',
      help: 'Number of VRPs in the last committed snapshot of a session',
      labelNames: ['cache'],
      registers: [this.registry]
    })

    this.sessionSerial = new Prometheus.Gauge<'cache'>({
      name: 'rtr_session_serial',
      help: 'Serial number of the last committed snapshot of a session',
      labelNames: ['cache'],
      registers: [this.registry]
    })

    this.publishedVersion = new Prometheus.Gauge({
      name: 'rtr_published_version',
      help: 'Version of the currently published VRP snapshot',
      registers: [this.registry]
    })

    this.validations = new Prometheus.Counter<'state'>({
      name: 'rtr_validations_total',
      help: 'Total number of route origin validations',
      labelNames: ['state'],
      registers: [this.registry]
    })
  }

  countPdu (cache: string, type: PduType) {
    this.pdusReceived.inc({ cache, type: PduType[type] })
  }

  collectDefaultMetrics () {
    Prometheus.collectDefaultMetrics({ register: this.registry })
  }

  getContentType () {
    return this.registry.contentType
  }

  getStatus () {
    return this.registry.getMetricsAsJSON()
  }

  getMetrics () {
    return this.registry.metrics()
  }
}
