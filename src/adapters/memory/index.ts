export { InMemoryExpenseRepository } from './in-memory-expense-repository.js'
export { InMemoryParticipantRepository } from './in-memory-participant-repository.js'
