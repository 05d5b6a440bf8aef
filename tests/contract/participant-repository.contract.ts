import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { ParticipantRepository } from '../../src/core/ports/participant-repository.js'

export function createParticipantRepositoryContractTests(
  name: string,
  getRepository: () => Promise<ParticipantRepository>,
  cleanup?: () => Promise<void>
) {
  describe(`ParticipantRepository Contract: ${name}`, () => {
    let repo: ParticipantRepository

    beforeEach(async () => {
      repo = await getRepository()
    })

    if (cleanup) {
      afterEach(async () => {
        await cleanup()
      })
    }

    it('should register and rename real participants', async () => {
      await repo.ensureParticipant('contract', 7, 'Dana')
      const renamed = await repo.ensureParticipant('contract', 7, ' Dana R ')

      expect(renamed.name).toBe('Dana R')
      expect(await repo.listParticipants('contract')).toHaveLength(1)
    })

    it('should allocate virtual ids downwards', async () => {
      await repo.ensureParticipant('contract', 7, 'Dana')
      const first = await repo.addVirtualParticipant('contract', 'Guest')
      const second = await repo.addVirtualParticipant('contract', 'Driver')

      expect(first?.id).toBe(-1)
      expect(second?.id).toBe(-2)
      expect(second?.isVirtual).toBe(true)
      expect((await repo.listParticipants('contract')).map(p => p.id)).toEqual([-2, -1, 7])
    })

    it('should refuse blank or duplicate virtual names', async () => {
      await repo.ensureParticipant('contract', 7, 'Dana')

      expect(await repo.addVirtualParticipant('contract', '   ')).toBeNull()
      expect(await repo.addVirtualParticipant('contract', 'dana')).toBeNull()
    })

    it('should update weights and reject non-positive ones', async () => {
      await repo.ensureParticipant('contract', 7, 'Dana')

      const updated = await repo.setWeight('contract', 7, '1.5')
      expect(updated?.weight.toString()).toBe('1.5')
      expect((await repo.getParticipant('contract', 7))?.weight.toString()).toBe('1.5')

      await expect(repo.setWeight('contract', 7, 0)).rejects.toThrow('Participant weight must be positive')
      expect(await repo.setWeight('contract', 99, 2)).toBeNull()
    })
  })
}
