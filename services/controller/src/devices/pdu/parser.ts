// services/controller/src/devices/pdu/parser.ts

import type { GroupState, OutletState, SensorReadings } from './types.js'

/* -------------------------------------------------------------------------- */
/*  Field grammars                                                            */
/* -------------------------------------------------------------------------- */

const CURRENT_RE = /RMS Current:\s*([\d.]+)\s*A/
const POWER_RE = /Reading:\s*([\d.]+)\s*W/
const TEMPERATURE_RE = /Reading:\s*([\d.]+)\s*deg C/
const HUMIDITY_RE = /Reading:\s*([\d.]+)\s*%/

const OUTLET_LINE_RE = /Outlet\s*(\d+)\s*-?\s*([^:\r\n]*):\s*Power state:\s*([A-Za-z]+)/g
const GROUP_HEADER_RE = /Outlet Group (\d+)\s*-\s*/g
const GROUP_NAME_RE = /^([^:\r\n]*)/
const GROUP_STATE_RE = /State:\s*([^\r\n]+)/
const GROUP_MEMBER_RE = /Outlet (\d+)[^:\r\n]*:\s*(On|Off)\b/gi
const ON_COUNT_RE = /(\d+)\s*on\b/i
const OFF_COUNT_RE = /(\d+)\s*off\b/i

export const GROUP_LISTING_ECHO = 'show outletgroups'
export const UNUSED_GROUP_NAME = 'Unused Group'

export interface OutletReading {
    index: number
    name: string
    powered: boolean
}

export interface GroupMemberReading {
    index: number
    powered: boolean
}

export interface GroupReading {
    index: number
    name: string
    powered: boolean
    onCount: number
    offCount: number
    members: GroupMemberReading[]
}

export interface ParsedResponse {
    sensors: Partial<SensorReadings>
    outlets: OutletReading[]
    groups: GroupReading[]
    /** True when the buffer was a group listing; absent groups are then unused. */
    groupListing: boolean
    /** Per-field extraction problems; never fatal to the rest of the response. */
    issues: string[]
}

/* -------------------------------------------------------------------------- */
/*  Extraction                                                                */
/* -------------------------------------------------------------------------- */

export function parseResponse(text: string): ParsedResponse {
    const issues: string[] = []

    const field = <T>(name: string, extract: () => T, fallback: T): T => {
        try {
            return extract()
        } catch (err) {
            issues.push(`${name}: ${err instanceof Error ? err.message : String(err)}`)
            return fallback
        }
    }

    const sensors = field('sensors', () => extractSensors(text), {})
    const outlets = field('outlets', () => extractOutlets(text), [])
    const groups = field('groups', () => extractGroups(text), [])

    return {
        sensors,
        outlets,
        groups,
        groupListing: groups.length > 0 || text.includes(GROUP_LISTING_ECHO),
        issues,
    }
}

export function extractSensors(text: string): Partial<SensorReadings> {
    const out: Partial<SensorReadings> = {}

    const current = CURRENT_RE.exec(text)
    if (current) out.current = `${current[1]} A`

    const power = POWER_RE.exec(text)
    if (power) out.activePower = `${power[1]} W`

    const temp = TEMPERATURE_RE.exec(text)
    if (temp) out.temperature = `${temp[1]} °C`

    const humidity = HUMIDITY_RE.exec(text)
    if (humidity) out.humidity = `${humidity[1]} %`

    return out
}

export function extractOutlets(text: string): OutletReading[] {
    const out: OutletReading[] = []
    for (const m of text.matchAll(OUTLET_LINE_RE)) {
        out.push({
            index: Number.parseInt(m[1], 10),
            name: m[2].trim(),
            powered: m[3].toLowerCase() === 'on',
        })
    }
    return out
}

/**
 * Split a group listing into one block per `Outlet Group <n> - ` header and
 * read name, state summary and member sub-lines from each block.
 */
export function extractGroups(text: string): GroupReading[] {
    const headers = [...text.matchAll(GROUP_HEADER_RE)]
    const out: GroupReading[] = []

    headers.forEach((h, i) => {
        const start = (h.index ?? 0) + h[0].length
        const end = i + 1 < headers.length ? (headers[i + 1].index ?? text.length) : text.length
        const block = text.slice(start, end)

        const stateMatch = GROUP_STATE_RE.exec(block)
        if (!stateMatch) return

        const summary = parseGroupSummary(stateMatch[1])
        const nameMatch = GROUP_NAME_RE.exec(block)

        out.push({
            index: Number.parseInt(h[1], 10),
            name: cleanGroupName(nameMatch ? nameMatch[1] : ''),
            powered: summary.powered,
            onCount: summary.onCount,
            offCount: summary.offCount,
            members: [...block.matchAll(GROUP_MEMBER_RE)].map(m => ({
                index: Number.parseInt(m[1], 10),
                powered: m[2].toLowerCase() === 'on',
            })),
        })
    })

    return out
}

/**
 * A group is on iff none of its members is off. A summary reporting neither
 * an on nor an off member is shown as off.
 */
export function parseGroupSummary(summary: string): { powered: boolean; onCount: number; offCount: number } {
    const on = ON_COUNT_RE.exec(summary)
    const off = OFF_COUNT_RE.exec(summary)

    if (!on && !off) {
        const powered = /^\s*on\b/i.test(summary)
        return { powered, onCount: 0, offCount: 0 }
    }

    const onCount = on ? Number.parseInt(on[1], 10) : 0
    const offCount = off ? Number.parseInt(off[1], 10) : 0
    if (onCount === 0 && offCount === 0) return { powered: false, onCount, offCount }
    return { powered: offCount === 0, onCount, offCount }
}

function cleanGroupName(raw: string): string {
    return raw
        .replace(/\s*\.{2,}.*$/, '')
        .replace(/\s+State\s*$/i, '')
        .trim()
}

/* -------------------------------------------------------------------------- */
/*  Model                                                                     */
/* -------------------------------------------------------------------------- */

export function createOutletStates(count: number): OutletState[] {
    return Array.from({ length: count }, (_, i) => ({
        index: i + 1,
        name: `Outlet ${i + 1}`,
        powered: false,
        disabled: true,
        known: false,
    }))
}

export function createGroupStates(count: number): GroupState[] {
    return Array.from({ length: count }, (_, i) => ({
        index: i + 1,
        name: `Group ${i + 1}`,
        powered: false,
        members: [],
        unused: false,
        disabled: true,
    }))
}

export interface ParseModel {
    outlets: OutletState[]
    groups: GroupState[]
    sensors: SensorReadings
}

export interface ApplyFlags {
    revertingState: boolean
    groupOperationInFlight: boolean
}

export interface ApplyResult extends ParseModel {
    changed: {
        outlets: boolean
        groups: boolean
        sensors: boolean
    }
}

/**
 * Fold a parsed response into a model without mutating it.
 *
 * - outlet lines are skipped while a revert is in progress
 * - group member sub-lines update outlets only during a group operation
 * - a group listing marks every group it does not mention as unused
 */
export function applyParsedResponse(model: ParseModel, parsed: ParsedResponse, flags: ApplyFlags): ApplyResult {
    const sensors: SensorReadings = { ...model.sensors, ...parsed.sensors }
    const outlets = model.outlets.map(o => ({ ...o }))
    const groups = model.groups.map(g => ({ ...g, members: [...g.members] }))

    const outletAt = (index: number): OutletState | undefined => outlets[index - 1]
    const groupAt = (index: number): GroupState | undefined => groups[index - 1]

    if (!flags.revertingState) {
        for (const r of parsed.outlets) {
            const o = outletAt(r.index)
            if (!o) continue
            o.powered = r.powered
            o.known = true
            if (r.name !== '') o.name = r.name
        }

        for (const r of parsed.groups) {
            const g = groupAt(r.index)
            if (!g) continue
            g.powered = r.powered
            g.name = r.name !== '' ? r.name : g.name
            g.members = r.members.map(m => m.index)
            g.unused = false
            g.disabled = false
        }

        if (flags.groupOperationInFlight) {
            for (const r of parsed.groups) {
                for (const m of r.members) {
                    const o = outletAt(m.index)
                    if (!o) continue
                    o.powered = m.powered
                    o.known = true
                }
            }
        }
    }

    if (parsed.groupListing) {
        const seen = new Set(parsed.groups.map(g => g.index))
        for (const g of groups) {
            if (seen.has(g.index)) continue
            g.powered = false
            g.unused = true
            g.disabled = true
            g.name = UNUSED_GROUP_NAME
            g.members = []
        }
    }

    return {
        outlets,
        groups,
        sensors,
        changed: {
            outlets: !sameList(model.outlets, outlets),
            groups: !sameList(model.groups, groups),
            sensors: !sameRecord(model.sensors, sensors),
        },
    }
}

function sameList<T extends object>(a: T[], b: T[]): boolean {
    return a.length === b.length && a.every((item, i) => JSON.stringify(item) === JSON.stringify(b[i]))
}

function sameRecord(a: SensorReadings, b: SensorReadings): boolean {
    return a.current === b.current
        && a.activePower === b.activePower
        && a.temperature === b.temperature
        && a.humidity === b.humidity
}
