import { XMLParser, XMLValidator } from 'fast-xml-parser'
import { Debugger } from '../utils/debug'
import { DescriptorError, DomainErrorCode } from '../types/errors.types'
import {
  DomainDefinition,
  DomainDisk,
  DomainInterface,
  DomainOs,
  FilterRef
} from '../types/domain.types'

/** Parsed element: attributes under '@_<name>', text under '#text' */
type XmlNode = Record<string, unknown>

/** Element paths that may repeat and are always returned as arrays */
const REPEATED_ELEMENTS: ReadonlySet<string> = new Set([
  'domain.devices.disk',
  'domain.devices.interface',
  'domain.devices.interface.filterref.parameter',
  'domain.os.boot'
])

const ATTRIBUTE_PREFIX = '@_'
const TEXT_KEY = '#text'

function isNode (value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Element as a node. Elements without attributes or children come back from
 * the parser as plain strings, so those become empty nodes.
 */
function asNode (value: unknown): XmlNode | undefined {
  if (isNode(value)) {
    return value
  }
  return typeof value === 'string' ? {} : undefined
}

function child (node: XmlNode | undefined, name: string): XmlNode | undefined {
  return node ? asNode(node[name]) : undefined
}

function children (node: XmlNode | undefined, name: string): XmlNode[] {
  const value = node?.[name]
  if (!Array.isArray(value)) {
    return []
  }
  return value.map(asNode).filter((entry): entry is XmlNode => entry !== undefined)
}

function attr (node: XmlNode | undefined, name: string): string {
  const value = node?.[ATTRIBUTE_PREFIX + name]
  return typeof value === 'string' ? value : ''
}

/** Attribute value, or undefined when missing or empty */
function optionalAttr (node: XmlNode | undefined, name: string): string | undefined {
  const value = attr(node, name)
  return value === '' ? undefined : value
}

function text (node: XmlNode | undefined, name: string): string {
  const value = node?.[name]
  if (typeof value === 'string') {
    return value
  }
  const inner = isNode(value) ? value[TEXT_KEY] : undefined
  return typeof inner === 'string' ? inner : ''
}

/**
 * DomainXmlParser turns domain descriptor markup into a DomainDefinition.
 *
 * Values are never type-coerced by the XML layer: names and UUIDs stay
 * strings, and only `memory` and `vcpu` are read as integers. Parsing the
 * same markup twice yields equal output.
 *
 * @example
 * ```typescript
 * const parser = new DomainXmlParser()
 * const definition = parser.parse(await handle.getXMLDesc())
 * console.log(definition.name, definition.devices.disks.length)
 * ```
 */
export class DomainXmlParser {
  private readonly parser: XMLParser
  private readonly debug: Debugger

  constructor () {
    this.debug = new Debugger('xml-parser')
    this.parser = new XMLParser({
      ignoreAttributes: false,
      attributeNamePrefix: ATTRIBUTE_PREFIX,
      textNodeName: TEXT_KEY,
      parseTagValue: false,
      parseAttributeValue: false,
      trimValues: true,
      isArray: (_tagName: string, jPath: string) => REPEATED_ELEMENTS.has(jPath)
    })
  }

  /**
   * Parses descriptor markup.
   * @param xml - Markup as returned by the hypervisor
   * @throws DescriptorError (DESCRIPTOR_PARSE_FAILED) on malformed markup,
   *         a root other than <domain>, missing identity or non-numeric sizes
   */
  parse (xml: string): DomainDefinition {
    const validation = XMLValidator.validate(xml)
    if (validation !== true) {
      const { msg, line } = validation.err
      this.debug.log('error', `Malformed descriptor markup at line ${line}: ${msg}`)
      throw this.parseError(`Malformed descriptor markup at line ${line}: ${msg}`)
    }

    const document: unknown = this.parser.parse(xml)
    const domain = isNode(document) ? asNode(document.domain) : undefined
    if (!domain) {
      throw this.parseError('Descriptor markup has no <domain> root element')
    }

    const name = text(domain, 'name')
    const uuid = text(domain, 'uuid')
    if (name === '') {
      throw this.parseError('Descriptor markup is missing <name>')
    }
    if (uuid === '') {
      throw this.parseError(`Descriptor markup for ${name} is missing <uuid>`)
    }

    const devices = child(domain, 'devices')

    return {
      type: attr(domain, 'type'),
      uuid,
      name,
      memory: this.integer(domain, 'memory', name),
      vpcu: this.integer(domain, 'vcpu', name),
      devices: {
        disks: children(devices, 'disk').map((disk) => this.parseDisk(disk)),
        interfaces: children(devices, 'interface').map((iface) => this.parseInterface(iface))
      },
      os: this.parseOs(child(domain, 'os'))
    }
  }

  private parseDisk (disk: XmlNode): DomainDisk {
    const driver = child(disk, 'driver')
    const source = child(disk, 'source')
    const target = child(disk, 'target')
    const file = optionalAttr(source, 'file')
    const device = optionalAttr(source, 'dev')

    return {
      type: attr(disk, 'type'),
      device: attr(disk, 'device'),
      driver: {
        name: attr(driver, 'name'),
        type: attr(driver, 'type')
      },
      source: {
        ...(file !== undefined ? { file } : {}),
        ...(device !== undefined ? { device } : {})
      },
      target: {
        dev: attr(target, 'dev'),
        bus: attr(target, 'bus')
      }
    }
  }

  private parseInterface (iface: XmlNode): DomainInterface {
    const source = child(iface, 'source')
    const network = optionalAttr(source, 'network')
    const bridge = optionalAttr(source, 'bridge')
    const modelType = optionalAttr(child(iface, 'model'), 'type')

    return {
      type: attr(iface, 'type'),
      source: {
        ...(network !== undefined ? { network } : {}),
        ...(bridge !== undefined ? { bridge } : {})
      },
      mac: {
        address: attr(child(iface, 'mac'), 'address')
      },
      model: modelType !== undefined ? { type: modelType } : {},
      filterref: this.parseFilterRef(child(iface, 'filterref'))
    }
  }

  private parseFilterRef (filterref: XmlNode | undefined): FilterRef {
    return {
      filter: attr(filterref, 'filter'),
      parameters: children(filterref, 'parameter').map((parameter) => ({
        name: attr(parameter, 'name'),
        value: attr(parameter, 'value')
      }))
    }
  }

  private parseOs (os: XmlNode | undefined): DomainOs {
    const type = child(os, 'type')
    const arch = optionalAttr(type, 'arch')
    const machine = optionalAttr(type, 'machine')
    const bootDev = optionalAttr(children(os, 'boot')[0], 'dev')

    return {
      type: {
        type: text(os, 'type'),
        ...(arch !== undefined ? { arch } : {}),
        ...(machine !== undefined ? { machine } : {})
      },
      boot: bootDev !== undefined ? { dev: bootDev } : {}
    }
  }

  private integer (node: XmlNode, name: string, domain: string): number {
    const value = text(node, name)
    if (value === '') {
      return 0
    }
    if (!/^\d+$/.test(value)) {
      throw this.parseError(`Descriptor markup for ${domain} has non-numeric <${name}>: ${value}`, domain)
    }
    return Number(value)
  }

  private parseError (message: string, domain?: string): DescriptorError {
    return new DescriptorError(DomainErrorCode.DESCRIPTOR_PARSE_FAILED, message, domain)
  }
}
