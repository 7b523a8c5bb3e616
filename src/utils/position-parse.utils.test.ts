import { parsePosition, parsePositions, RawPerpPosition, sumClosedPnl } from './position-parse.utils'

const WALLET = '0x00000000000000000000000000000000000000aa'

function raw(overrides: Partial<RawPerpPosition> = {}): RawPerpPosition {
  return {
    coin: 'ETH',
    szi: '1.5',
    entryPx: '3245.5',
    positionValue: '4950.0',
    unrealizedPnl: '81.75',
    returnOnEquity: '0.168',
    leverage: { value: 10 },
    liquidationPx: '2900.1',
    marginUsed: '495.0',
    ...overrides
  }
}

describe('parsePosition', () => {
  it('maps a long clearinghouse position', () => {
    expect(parsePosition(WALLET, raw())).toEqual({
      wallet: WALLET,
      coin: 'ETH',
      side: 'long',
      size: 1.5,
      entryPrice: 3245.5,
      markPrice: 3300,
      leverage: 10,
      notionalValue: 4950,
      unrealizedPnl: 81.75,
      returnOnEquity: 0.168,
      liquidationPrice: 2900.1,
      marginUsed: 495
    })
  })

  it('takes the side from the sign of szi and keeps size positive', () => {
    const parsed = parsePosition(WALLET, raw({ coin: 'SOL', szi: '-10', positionValue: '1800' }))
    expect(parsed?.side).toBe('short')
    expect(parsed?.size).toBe(10)
    expect(parsed?.markPrice).toBe(180)
  })

  it('skips flat positions', () => {
    expect(parsePosition(WALLET, raw({ szi: '0.0' }))).toBeNull()
  })

  it('accepts leverage given as a string and a missing liquidation price', () => {
    const parsed = parsePosition(WALLET, raw({ leverage: { value: '20' }, liquidationPx: null }))
    expect(parsed?.leverage).toBe(20)
    expect(parsed?.liquidationPrice).toBeNull()
  })
})

describe('parsePositions', () => {
  it('keeps only open positions', () => {
    const parsed = parsePositions(WALLET, [raw({ coin: 'BTC', szi: '0' }), raw({ coin: 'ETH' })])
    expect(parsed.map(p => p.coin)).toEqual(['ETH'])
  })
})

describe('sumClosedPnl', () => {
  it('adds closedPnl of the matching coin only', () => {
    const fills = [
      { coin: 'BTC', closedPnl: '120.5' },
      { coin: 'ETH', closedPnl: '-4' },
      { coin: 'BTC', closedPnl: '-20.25' }
    ]
    expect(sumClosedPnl(fills, 'BTC')).toBe(100.25)
    expect(sumClosedPnl(fills, 'SOL')).toBe(0)
  })
})
