import { describe, expect, it } from 'vitest';
import { reconcile } from '../reconcile.js';
import { makeTransfer } from './helpers.js';

describe('reconcile', () => {
  it('pairs both sides of a transfer and keeps the buying side on disagreement', () => {
    const incoming = makeTransfer(
      { player_id: '5001', player_name: 'Tomas Varga', market_value: 18_000_000, fee: 20_000_000 },
      { clubId: '101', dealingClubId: '202', transferId: '9001' }
    );
    const outgoing = makeTransfer(
      {
        club: 'Harbor City',
        movement: 'out',
        player_id: '5001',
        player_name: 'Tomas Varga',
        market_value: 17_500_000,
        dealing_club: 'Northbridge',
        fee: 20_000_000
      },
      { clubId: '202', dealingClubId: '101', transferId: '9001' }
    );

    const result = reconcile([incoming, outgoing]);

    expect(result.stats).toEqual({ groups: 1, pairs: 1, unpaired: 0 });
    expect(result.transfers.map(({ record }) => [record.club, record.dealing_club, record.market_value])).toEqual([
      ['Northbridge FC', 'Harbor City', 18_000_000],
      ['Harbor City', 'Northbridge FC', 18_000_000]
    ]);
    expect(result.conflicts).toEqual([
      {
        field: 'market_value',
        player_id: '5001',
        player_name: 'Tomas Varga',
        season: 2024,
        window: 'summer',
        buyingClub: 'Northbridge FC',
        sellingClub: 'Harbor City',
        inValue: 18_000_000,
        outValue: 17_500_000,
        resolved: 18_000_000
      }
    ]);
  });

  it('falls back to the known value when one side has none', () => {
    const result = reconcile([
      makeTransfer({ fee: null }, { clubId: '101', dealingClubId: '202' }),
      makeTransfer(
        { club: 'Harbor City', movement: 'out', dealing_club: 'Northbridge FC', fee: 2_000_000 },
        { clubId: '202', dealingClubId: '101' }
      )
    ]);

    expect(result.transfers.map(({ record }) => record.fee)).toEqual([2_000_000, 2_000_000]);
    expect(result.conflicts.map((conflict) => [conflict.field, conflict.resolved])).toEqual([['fee', 2_000_000]]);
  });

  it('marks both sides as a loan when either page says so', () => {
    const result = reconcile([
      makeTransfer({ is_loan: false }, { clubId: '101', dealingClubId: '202' }),
      makeTransfer(
        { club: 'Harbor City', movement: 'out', dealing_club: 'Northbridge FC', is_loan: true },
        { clubId: '202', dealingClubId: '101' }
      )
    ]);

    expect(result.transfers.map(({ record }) => record.is_loan)).toEqual([true, true]);
    expect(result.conflicts).toHaveLength(1);
    expect(result.conflicts[0]).toMatchObject({ field: 'is_loan', inValue: false, outValue: true, resolved: true });
  });

  it('keeps a loan and a later permanent move of one player apart', () => {
    const loanIn = makeTransfer(
      { club: 'Harbor City', player_id: '7', dealing_club: 'Northbridge FC', is_loan: true },
      { clubId: '202', dealingClubId: '101' }
    );
    const loanOut = makeTransfer(
      { club: 'Northbridge FC', movement: 'out', player_id: '7', dealing_club: 'Harbor City', is_loan: true },
      { clubId: '101', dealingClubId: '202' }
    );
    const saleOut = makeTransfer(
      { club: 'Harbor City', movement: 'out', player_id: '7', dealing_club: 'Eastvale United', fee: 5_000_000 },
      { clubId: '202', dealingClubId: '303', rowIndex: 1 }
    );
    const saleIn = makeTransfer(
      { club: 'Eastvale United', player_id: '7', dealing_club: 'Harbor City', fee: 5_000_000 },
      { clubId: '303', dealingClubId: '202' }
    );

    const result = reconcile([loanIn, loanOut, saleOut, saleIn]);

    expect(result.stats).toEqual({ groups: 2, pairs: 2, unpaired: 0 });
    expect(result.conflicts).toEqual([]);
    expect(result.transfers.map(({ record }) => [record.club, record.movement, record.dealing_club, record.fee, record.is_loan])).toEqual([
      ['Harbor City', 'in', 'Northbridge FC', null, true],
      ['Northbridge FC', 'out', 'Harbor City', null, true],
      ['Harbor City', 'out', 'Eastvale United', 5_000_000, false],
      ['Eastvale United', 'in', 'Harbor City', 5_000_000, false]
    ]);
  });

  it('resolves a counterpart printed without a link by club name', () => {
    const result = reconcile([
      makeTransfer({ dealing_club: 'Harbor City FC', fee: 1_000_000 }, { clubId: '101' }),
      makeTransfer(
        { club: 'Harbor City', movement: 'out', dealing_club: 'Northbridge', fee: 1_000_000 },
        { clubId: '202', dealingClubId: '101' }
      )
    ]);

    expect(result.stats.pairs).toBe(1);
    expect(result.transfers.map(({ record }) => record.dealing_club)).toEqual(['Harbor City', 'Northbridge FC']);
  });

  it('pairs repeated moves by fee and loan before page order', () => {
    const transfers = [
      makeTransfer({ player_id: '8', is_loan: true }, { clubId: '101', dealingClubId: '202', rowIndex: 0 }),
      makeTransfer({ player_id: '8', fee: 3_000_000 }, { clubId: '101', dealingClubId: '202', rowIndex: 1 }),
      makeTransfer(
        { club: 'Harbor City', movement: 'out', player_id: '8', dealing_club: 'Northbridge FC', fee: 3_000_000 },
        { clubId: '202', dealingClubId: '101', rowIndex: 0 }
      ),
      makeTransfer(
        { club: 'Harbor City', movement: 'out', player_id: '8', dealing_club: 'Northbridge FC', is_loan: true },
        { clubId: '202', dealingClubId: '101', rowIndex: 1 }
      )
    ];

    const result = reconcile(transfers);

    expect(result.stats).toEqual({ groups: 1, pairs: 2, unpaired: 0 });
    expect(result.conflicts).toEqual([]);
    expect(result.transfers.map(({ record }) => [record.fee, record.is_loan])).toEqual([
      [null, true],
      [3_000_000, false],
      [3_000_000, false],
      [null, true]
    ]);
  });

  it('passes unpaired records through untouched', () => {
    const lone = makeTransfer({ dealing_club: 'Without Club' }, { clubId: '101' });

    const result = reconcile([lone]);

    expect(result.transfers[0]).toBe(lone);
    expect(result.stats).toEqual({ groups: 1, pairs: 0, unpaired: 1 });
  });
});
