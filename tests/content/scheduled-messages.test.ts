import { createContentStore } from '../../src/content/content-store';
import { ScheduledMessageRepository } from '../../src/content/scheduled-messages';
import { NotFoundError, ValidationError } from '../../src/system/error-handling';
import { MemoryPersistence, createTestClock, silentLogger } from '../helpers/fakes';

describe('ScheduledMessageRepository', () => {
  let repository: ScheduledMessageRepository;
  let testClock: ReturnType<typeof createTestClock>;

  beforeEach(() => {
    let nextId = 0;
    testClock = createTestClock('2026-05-10T12:00:00.000Z');
    repository = new ScheduledMessageRepository(createContentStore(new MemoryPersistence(), silentLogger(), testClock.clock), {
      clock: testClock.clock,
      logger: silentLogger(),
      idGenerator: prefix => `${prefix}_${++nextId}`
    });
  });

  it('should schedule a pending message', async () => {
    const message = await repository.schedule({
      destinationId: '-100',
      body: 'Live stream tonight',
      dueAt: new Date('2026-05-10T18:00:00.000Z')
    });

    expect(message).toEqual({
      id: 'msg_1',
      destinationId: '-100',
      body: 'Live stream tonight',
      dueAt: '2026-05-10T18:00:00.000Z',
      category: 'general',
      status: 'pending',
      createdAt: '2026-05-10T12:00:00.000Z'
    });
  });

  it('should reject invalid messages', async () => {
    await expect(repository.schedule({ destinationId: '', body: ' ', dueAt: new Date('nope') }))
      .rejects.toMatchObject({
        problems: ['Destination id is required', 'Message body is required', 'Due time is not a valid date']
      });
    expect(await repository.listPending()).toEqual([]);
  });

  it('should list pending messages by due time', async () => {
    await repository.schedule({ destinationId: '-100', body: 'late', dueAt: new Date('2026-05-12T09:00:00.000Z') });
    await repository.schedule({ destinationId: '-200', body: 'early', dueAt: new Date('2026-05-11T09:00:00.000Z') });
    await repository.schedule({ destinationId: '-100', body: 'middle', dueAt: new Date('2026-05-11T18:00:00.000Z') });

    expect((await repository.listPending()).map(message => message.body)).toEqual(['early', 'middle', 'late']);
    expect((await repository.listPending('-100')).map(message => message.body)).toEqual(['middle', 'late']);
  });

  it('should return only due messages', async () => {
    await repository.schedule({ destinationId: '-100', body: 'past', dueAt: new Date('2026-05-10T11:00:00.000Z') });
    await repository.schedule({ destinationId: '-100', body: 'now', dueAt: new Date('2026-05-10T12:00:00.000Z') });
    await repository.schedule({ destinationId: '-100', body: 'future', dueAt: new Date('2026-05-10T12:01:00.000Z') });

    const due = await repository.getDue(testClock.clock());

    expect(due.map(message => message.body)).toEqual(['past', 'now']);
  });

  it('should mark a message sent once', async () => {
    const message = await repository.schedule({ destinationId: '-100', body: 'hi', dueAt: new Date('2026-05-10T11:00:00.000Z') });
    testClock.advance(60_000);

    const sent = await repository.markSent(message.id);

    expect(sent.status).toBe('sent');
    expect(sent.sentAt).toBe('2026-05-10T12:01:00.000Z');
    expect(await repository.getDue()).toEqual([]);
    await expect(repository.markSent(message.id)).rejects.toThrow(`Scheduled message ${message.id} is already sent`);
  });

  it('should cancel only pending messages', async () => {
    const message = await repository.schedule({ destinationId: '-100', body: 'hi', dueAt: new Date('2026-05-11T00:00:00.000Z') });

    const cancelled = await repository.cancel(message.id);

    expect(cancelled.status).toBe('cancelled');
    expect(cancelled.cancelledAt).toBe('2026-05-10T12:00:00.000Z');
    await expect(repository.cancel(message.id)).rejects.toBeInstanceOf(ValidationError);
    await expect(repository.markSent(message.id)).rejects.toBeInstanceOf(ValidationError);
  });

  it('should report unknown ids', async () => {
    await expect(repository.cancel('msg_404')).rejects.toBeInstanceOf(NotFoundError);
    await expect(repository.get('msg_404')).rejects.toBeInstanceOf(NotFoundError);
  });
});
