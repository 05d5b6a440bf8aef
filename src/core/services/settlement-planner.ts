import { Decimal, EPSILON } from '../utils/decimal.js'
import { ParticipantId } from '../domain/participant.js'
import { Balances } from './balance-calculator.js'

export interface SettlementTransfer {
  from: ParticipantId
  to: ParticipantId
  amount: Decimal
}

interface Position {
  participantId: ParticipantId
  /**
   * Always positive: what is owed to a creditor or by a debtor
   */
  remaining: Decimal
}

/**
 * Larger amounts first; equal amounts by ascending participant id
 */
function comparePositions(a: Position, b: Position): number {
  const byAmount = b.remaining.comparedTo(a.remaining)
  return byAmount !== 0 ? byAmount : a.participantId - b.participantId
}

function insertSorted(queue: Position[], position: Position): void {
  let index = 0
  while (index < queue.length && comparePositions(queue[index], position) <= 0) {
    index++
  }
  queue.splice(index, 0, position)
}

/**
 * Greedy largest-magnitude pairing of debtors with creditors.
 *
 * Produces at most `participants - 1` transfers. The result is not guaranteed
 * to be globally minimal. The input map is left untouched.
 */
export function planSettlement(
  balances: ReadonlyMap<ParticipantId, Decimal>,
  epsilon: Decimal = EPSILON
): SettlementTransfer[] {
  const creditors: Position[] = []
  const debtors: Position[] = []

  for (const [participantId, balance] of balances) {
    if (balance.greaterThan(epsilon)) {
      creditors.push({ participantId, remaining: balance })
    } else if (balance.lessThan(epsilon.negated())) {
      debtors.push({ participantId, remaining: balance.abs() })
    }
  }

  creditors.sort(comparePositions)
  debtors.sort(comparePositions)

  const transfers: SettlementTransfer[] = []

  while (creditors.length > 0 && debtors.length > 0) {
    const creditor = creditors.shift()
    const debtor = debtors.shift()
    if (!creditor || !debtor) {
      break
    }

    const amount = Decimal.min(creditor.remaining, debtor.remaining)
    transfers.push({ from: debtor.participantId, to: creditor.participantId, amount })

    const creditorLeft = creditor.remaining.minus(amount)
    const debtorLeft = debtor.remaining.minus(amount)

    if (creditorLeft.greaterThan(epsilon)) {
      insertSorted(creditors, { participantId: creditor.participantId, remaining: creditorLeft })
    }
    if (debtorLeft.greaterThan(epsilon)) {
      insertSorted(debtors, { participantId: debtor.participantId, remaining: debtorLeft })
    }
  }

  return transfers
}

/**
 * Balances after every transfer has been paid
 */
export function applyTransfers(
  balances: ReadonlyMap<ParticipantId, Decimal>,
  transfers: readonly SettlementTransfer[]
): Balances {
  const result: Balances = new Map(balances)

  for (const transfer of transfers) {
    result.set(transfer.from, (result.get(transfer.from) ?? new Decimal(0)).plus(transfer.amount))
    result.set(transfer.to, (result.get(transfer.to) ?? new Decimal(0)).minus(transfer.amount))
  }

  return result
}
