import { describe, it, expect } from 'vitest'
import {
  matchStr,
  matchChiStreetOrVillage,
  matchDict,
} from '../../../src/core/matching.js'
import type { AddressFieldTree, StreetFieldNode } from '../../../src/types/candidate.js'

function street(fields: Record<string, string>): StreetFieldNode {
  return {
    kind: 'street',
    name: 'ChiStreet',
    nameField: 'VillageName' in fields ? 'VillageName' : 'StreetName',
    fields,
  }
}

describe('matchStr', () => {
  it('should score an exact substring as goodness 1', () => {
    expect(matchStr('九龍旺角彌敦道594號', 'StreetName', '彌敦道')).toEqual({
      fieldName: 'StreetName',
      fieldValue: '彌敦道',
      matchSpan: [4, 7],
      goodness: 1,
    })
  })

  it('should strip a leading qualifier the query omits', () => {
    const match = matchStr('兆康站', 'BuildingName', '港鐵兆康站')

    expect(match.matchSpan).toEqual([0, 3])
    expect(match.goodness).toBeCloseTo(0.2)
    expect(match.fieldValue).toBe('港鐵兆康站')
  })

  it('should score a half-length match as goodness 0', () => {
    const match = matchStr('五六七八', 'BuildingName', '一二三四五六七八')
    expect(match.matchSpan).toEqual([0, 4])
    expect(match.goodness).toBe(0)
  })

  it('should give up once half of the value has been stripped', () => {
    const match = matchStr('甲六七八', 'BuildingName', '一二三四五六七八')
    expect(match.matchSpan).toBeNull()
    expect(match.goodness).toBeNull()
  })

  it('should give up once three or fewer characters remain', () => {
    expect(matchStr('香港中環', 'EstateName', '美孚新邨').matchSpan).toBeNull()
    expect(matchStr('香港中環', 'DcDistrict', '中西區').matchSpan).toBeNull()
  })

  it('should count positions in code points', () => {
    expect(matchStr('𡋀𡋀彌敦道', 'StreetName', '彌敦道').matchSpan).toEqual([2, 5])
  })

  it('should report no match for an empty value', () => {
    expect(matchStr('香港', 'Region', '')).toEqual({
      fieldName: 'Region',
      fieldValue: '',
      matchSpan: null,
      goodness: null,
    })
  })
})

describe('matchChiStreetOrVillage', () => {
  it('should match only the last segment of the street name', () => {
    const matches = matchChiStreetOrVillage('屯門青麟路3號', street({ StreetName: '屯門 青麟路' }))

    expect(matches).toEqual([
      { fieldName: 'StreetName', fieldValue: '青麟路', matchSpan: [2, 5], goodness: 1 },
    ])
  })

  it('should match a building number right after the street', () => {
    const matches = matchChiStreetOrVillage(
      '九龍旺角彌敦道594號',
      street({ StreetName: '彌敦道', BuildingNoFrom: '594', BuildingNoTo: '596' })
    )

    expect(matches).toEqual([
      { fieldName: 'StreetName', fieldValue: '彌敦道', matchSpan: [4, 7], goodness: 1 },
      { fieldName: 'BuildingNoFrom', fieldValue: '594', matchSpan: [7, 11], goodness: 1 },
      { fieldName: 'BuildingNoTo', fieldValue: '596', matchSpan: [7, 11], goodness: 0.5 },
    ])
  })

  it('should parse a number range in the query', () => {
    const matches = matchChiStreetOrVillage(
      '彌敦道591-593號',
      street({ StreetName: '彌敦道', BuildingNoFrom: '591' })
    )

    expect(matches).toEqual([
      { fieldName: 'StreetName', fieldValue: '彌敦道', matchSpan: [0, 3], goodness: 1 },
      { fieldName: 'BuildingNoFrom', fieldValue: '591', matchSpan: [3, 11], goodness: 1 },
    ])
  })

  it('should reject a range that does not overlap under string comparison', () => {
    // '101' < '99' as strings, so 95-101 does not contain 99
    const matches = matchChiStreetOrVillage(
      '香港中環皇后大道中99號',
      street({ StreetName: '皇后大道中', BuildingNoFrom: '95', BuildingNoTo: '101' })
    )

    expect(matches[0]?.matchSpan).toEqual([4, 9])
    expect(matches[1]).toEqual({
      fieldName: 'BuildingNoFrom',
      fieldValue: '95',
      matchSpan: null,
      goodness: 0.5,
    })
    expect(matches[2]).toEqual({
      fieldName: 'BuildingNoTo',
      fieldValue: '101',
      matchSpan: null,
      goodness: 0.5,
    })
  })

  it('should leave building numbers unmatched when the street is not found', () => {
    const matches = matchChiStreetOrVillage(
      '旺角',
      street({ StreetName: '彌敦道', BuildingNoFrom: '1' })
    )

    expect(matches.map((m) => m.matchSpan)).toEqual([null, null])
    expect(matches[1]?.goodness).toBe(0.5)
  })

  it('should match villages by VillageName', () => {
    const matches = matchChiStreetOrVillage('大埔林村12號', {
      kind: 'street',
      name: 'ChiVillage',
      nameField: 'VillageName',
      fields: { VillageName: '大埔 林村', BuildingNoFrom: '12' },
    })

    expect(matches).toEqual([
      { fieldName: 'VillageName', fieldValue: '林村', matchSpan: [2, 4], goodness: 1 },
      { fieldName: 'BuildingNoFrom', fieldValue: '12', matchSpan: [4, 7], goodness: 1 },
    ])
  })

  it('should default an empty BuildingNoTo to BuildingNoFrom', () => {
    const matches = matchChiStreetOrVillage(
      '青山道5號',
      street({ StreetName: '青山道', BuildingNoFrom: '5', BuildingNoTo: '' })
    )

    expect(matches[2]).toEqual({
      fieldName: 'BuildingNoTo',
      fieldValue: '5',
      matchSpan: [3, 5],
      goodness: 1,
    })
  })
})

describe('matchDict', () => {
  it('should walk the tree in field order', () => {
    const tree: AddressFieldTree = [
      { kind: 'text', name: 'Region', value: '九龍' },
      {
        kind: 'group',
        name: 'ChiDistrict',
        children: [{ kind: 'text', name: 'DcDistrict', value: '油尖旺區' }],
      },
      street({ StreetName: '彌敦道', BuildingNoFrom: '594' }),
      { kind: 'text', name: 'BuildingName', value: '測試大廈' },
    ]

    const matches = matchDict('九龍旺角彌敦道594號測試大廈', tree)

    expect(matches.map((m) => m.fieldName)).toEqual([
      'Region',
      'DcDistrict',
      'StreetName',
      'BuildingNoFrom',
      'BuildingName',
    ])
    expect(matches.map((m) => m.matchSpan)).toEqual([
      [0, 2],
      null,
      [4, 7],
      [7, 11],
      [11, 15],
    ])
  })

  it('should return nothing for an empty tree', () => {
    expect(matchDict('香港', [])).toEqual([])
  })
})
