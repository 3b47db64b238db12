/**
 * @fileoverview Tests for entity-specific operations
 */

import { describe, expect, it } from 'vitest';
import { NotSavedError, ValidationError } from '@trellis/errors';
import { Action } from '../src/models/action.js';
import { Attachment } from '../src/models/attachment.js';
import { Board } from '../src/models/board.js';
import { Card } from '../src/models/card.js';
import { Checklist } from '../src/models/checklist.js';
import { CustomField } from '../src/models/custom-field.js';
import { CustomFieldItem } from '../src/models/custom-field-item.js';
import { Label } from '../src/models/label.js';
import { List } from '../src/models/list.js';
import { Member } from '../src/models/member.js';
import { Notification } from '../src/models/notification.js';
import { Organization } from '../src/models/organization.js';
import { Token } from '../src/models/token.js';
import { Webhook } from '../src/models/webhook.js';
import { createTestClient } from './support/fixtures.js';

describe('Board', () => {
  it('should close and reopen', async () => {
    const { client, transport } = createTestClient();
    transport.replyJson({ id: 'b1', closed: true }, { id: 'b1', closed: false });
    const board = client.materialize(Board, { id: 'b1', closed: false });

    await board.close();
    expect(board.isClosed).toBe(true);
    await board.reopen();

    expect(board.isClosed).toBe(false);
    expect(transport.calls).toEqual(['PUT /1/boards/b1', 'PUT /1/boards/b1']);
    expect(transport.requests.map((request) => request.body)).toEqual([
      { closed: true },
      { closed: false },
    ]);
  });

  it('should add and remove members', async () => {
    const { client, transport } = createTestClient();
    transport.replyJson({ id: 'b1' }, { id: 'b1' }, {});
    const board = client.materialize(Board, { id: 'b1' });
    const member = client.materialize(Member, { id: 'm2' });

    await board.addMember('m1');
    await board.addMember(member, 'admin');
    await board.removeMember(member);

    expect(transport.calls).toEqual([
      'PUT /1/boards/b1/members/m1',
      'PUT /1/boards/b1/members/m2',
      'DELETE /1/boards/b1/members/m2',
    ]);
    expect(transport.requests[0]?.body).toEqual({ type: 'normal' });
    expect(transport.requests[1]?.body).toEqual({ type: 'admin' });
  });

  it('should refuse member changes on an unsaved board', async () => {
    const { client } = createTestClient();
    const board = new Board(client, { name: 'Draft' });

    await expect(board.addMember('m1')).rejects.toThrow(
      'Cannot add a member to a Board that has not been saved',
    );
  });

  it('should expose typed attributes', () => {
    const { client } = createTestClient();
    const board = client.materialize(Board, {
      id: 'b1',
      name: 'Demo',
      desc: 'About',
      starred: true,
      dateLastActivity: '2026-01-02T03:04:05.000Z',
    });

    expect(board.description).toBe('About');
    expect(board.isStarred).toBe(true);
    expect(board.isClosed).toBe(false);
    expect(board.lastActivityAt?.toISOString()).toBe('2026-01-02T03:04:05.000Z');
  });
});

describe('Card', () => {
  it('should move to another list and forget the cached list', async () => {
    const { client, transport } = createTestClient();
    transport.replyJson(
      { id: 'l1' },
      { id: 'c1', idList: 'l2', idBoard: 'b1' },
      { id: 'l2', name: 'Done' },
    );
    const card = client.materialize(Card, { id: 'c1', idList: 'l1', idBoard: 'b1' });

    await card.list;
    await card.moveToList('l2');
    const list = await card.list;

    expect(list.name).toBe('Done');
    expect(transport.calls).toEqual(['GET /1/lists/l1', 'PUT /1/cards/c1', 'GET /1/lists/l2']);
    expect(transport.requests[1]?.body).toEqual({ idList: 'l2' });
  });

  it('should move to another board', async () => {
    const { client, transport } = createTestClient();
    transport.replyJson({ id: 'c1', idList: 'l9', idBoard: 'b2' });
    const card = client.materialize(Card, { id: 'c1', idList: 'l1', idBoard: 'b1' });
    const board = client.materialize(Board, { id: 'b2' });

    await card.moveToBoard(board, 'l9');

    expect(transport.lastRequest?.body).toEqual({ idBoard: 'b2', idList: 'l9' });
    expect(card.boardId).toBe('b2');
  });

  it('should add a comment', async () => {
    const { client, transport } = createTestClient();
    transport.replyJson({ id: 'a1', type: 'commentCard', data: { text: 'Hello' } });
    const card = client.materialize(Card, { id: 'c1' });

    const comment = await card.addComment('Hello');

    expect(comment).toBeInstanceOf(Action);
    expect(comment.text).toBe('Hello');
    expect(transport.calls).toEqual(['POST /1/cards/c1/actions/comments']);
    expect(transport.lastRequest?.body).toEqual({ text: 'Hello' });
  });

  it('should add and remove labels and members', async () => {
    const { client, transport } = createTestClient();
    transport.replyJson(['lb1'], [], ['m1'], []);
    const card = client.materialize(Card, { id: 'c1' });
    const label = client.materialize(Label, { id: 'lb1' });

    await card.addLabel(label);
    await card.removeLabel('lb1');
    await card.addMember('m1');
    await card.removeMember('m1');

    expect(transport.calls).toEqual([
      'POST /1/cards/c1/idLabels',
      'DELETE /1/cards/c1/idLabels/lb1',
      'POST /1/cards/c1/idMembers',
      'DELETE /1/cards/c1/idMembers/m1',
    ]);
    expect(transport.requests[0]?.body).toEqual({ value: 'lb1' });
    expect(transport.requests[2]?.body).toEqual({ value: 'm1' });
  });

  it('should refuse to apply an unsaved label', async () => {
    const { client, transport } = createTestClient();
    const card = client.materialize(Card, { id: 'c1' });

    await expect(card.addLabel(new Label(client, { name: 'Bug' }))).rejects.toThrow(NotSavedError);
    expect(transport.requests).toHaveLength(0);
  });

  it('should list, add and remove attachments', async () => {
    const { client, transport } = createTestClient();
    transport.replyJson(
      [{ id: 'at1', name: 'notes.pdf', bytes: 2048, isUpload: true, mimeType: 'application/pdf' }],
      { id: 'at2', name: 'Design', url: 'https://example.com/design', isUpload: false },
      {},
    );
    const card = client.materialize(Card, { id: 'c1' });

    const attachments = await card.attachments;
    const link = await card.addAttachment({ url: 'https://example.com/design', name: 'Design' });
    const loadedAfterAdd = card.attachments.isLoaded;
    await card.removeAttachment(link);

    expect(attachments[0]).toBeInstanceOf(Attachment);
    expect(attachments[0]?.bytes).toBe(2048);
    expect(attachments[0]?.isUpload).toBe(true);
    expect(link.name).toBe('Design');
    expect(link.isUpload).toBe(false);
    expect(loadedAfterAdd).toBe(false);
    expect(transport.calls).toEqual([
      'GET /1/cards/c1/attachments',
      'POST /1/cards/c1/attachments',
      'DELETE /1/cards/c1/attachments/at2',
    ]);
    expect(transport.requests[1]?.body).toEqual({ url: 'https://example.com/design', name: 'Design' });
  });

  it('should set and clear custom field values', async () => {
    const { client, transport } = createTestClient();
    transport.replyJson({}, {}, {}, {}, {}, {});
    const card = client.materialize(Card, { id: 'c1' });
    const field = client.materialize(CustomField, { id: 'f1', type: 'number' });

    await card.setCustomField(field, { number: 3 });
    await card.setCustomField('f2', { text: 'Hello' });
    await card.setCustomField('f3', { checked: true });
    await card.setCustomField('f4', { date: new Date('2026-03-04T05:06:07.000Z') });
    await card.setCustomField('f5', { option: 'o1' });
    await card.setCustomField(field, null);

    expect(transport.calls[0]).toBe('PUT /1/cards/c1/customField/f1/item');
    expect(transport.calls[4]).toBe('PUT /1/cards/c1/customField/f5/item');
    expect(transport.requests.map((request) => request.body)).toEqual([
      { value: { number: '3' } },
      { value: { text: 'Hello' } },
      { value: { checked: 'true' } },
      { value: { date: '2026-03-04T05:06:07.000Z' } },
      { idValue: 'o1' },
      { value: '' },
    ]);
  });

  it('should refuse to set a custom field on an unsaved card', async () => {
    const { client, transport } = createTestClient();
    const card = new Card(client, { name: 'Task' });

    await expect(card.setCustomField('f1', { text: 'Hello' })).rejects.toThrow(
      'Cannot set custom fields on a Card that has not been saved',
    );
    expect(transport.requests).toHaveLength(0);
  });

  it('should store due dates as ISO strings', () => {
    const { client } = createTestClient();
    const card = client.materialize(Card, { id: 'c1', due: null });

    card.due = new Date('2026-03-04T05:06:07.000Z');
    expect(card.changes()).toEqual({ due: '2026-03-04T05:06:07.000Z' });
    expect(card.due?.getTime()).toBe(Date.parse('2026-03-04T05:06:07.000Z'));

    card.due = undefined;
    expect(card.isDirty).toBe(false);
  });
});

describe('List', () => {
  it('should archive every card', async () => {
    const { client, transport } = createTestClient();
    transport.replyJson({});
    const list = client.materialize(List, { id: 'l1' });

    await list.archiveAllCards();

    expect(transport.calls).toEqual(['POST /1/lists/l1/archiveAllCards']);
    expect(transport.lastRequest?.body).toBeUndefined();
  });

  it('should move every card to another list', async () => {
    const { client, transport } = createTestClient();
    transport.replyJson([]);
    const list = client.materialize(List, { id: 'l1', idBoard: 'b1' });
    const target = client.materialize(List, { id: 'l2', idBoard: 'b2' });

    await list.moveAllCards(target);

    expect(transport.calls).toEqual(['POST /1/lists/l1/moveAllCards']);
    expect(transport.lastRequest?.body).toEqual({ idBoard: 'b2', idList: 'l2' });
  });

  it('should require the board of the target list', async () => {
    const { client, transport } = createTestClient();
    const list = client.materialize(List, { id: 'l1' });
    const target = client.materialize(List, { id: 'l2' });

    await expect(list.moveAllCards(target)).rejects.toThrow(ValidationError);
    await expect(list.moveAllCards(target)).rejects.toThrow('List l2 has no board id');
    expect(transport.requests).toHaveLength(0);
  });
});

describe('Member', () => {
  it('should find the current member', async () => {
    const { client, transport } = createTestClient();
    transport.replyJson({ id: 'm1', username: 'tester', avatarUrl: 'https://avatars.example.com/m1' });

    const me = await Member.me(client);

    expect(me.username).toBe('tester');
    expect(me.avatarUrl).toBe('https://avatars.example.com/m1/170.png');
    expect(transport.calls).toEqual(['GET /1/members/me']);
  });

  it('should list open boards', async () => {
    const { client, transport } = createTestClient();
    transport.replyJson([{ id: 'b1' }]);
    const member = client.materialize(Member, { id: 'm1', avatarUrl: null });

    await member.boards;

    expect(member.avatarUrl).toBeUndefined();
    expect(transport.calls).toEqual(['GET /1/members/m1/boards?filter=open']);
  });
});

describe('Organization', () => {
  it('should list all boards', async () => {
    const { client, transport } = createTestClient();
    transport.replyJson([{ id: 'b1' }, { id: 'b2' }]);
    const organization = client.materialize(Organization, { id: 'o1', displayName: 'Team' });

    const boards = await organization.boards;

    expect(boards).toHaveLength(2);
    expect(transport.calls).toEqual(['GET /1/organizations/o1/boards?filter=all']);
  });
});

describe('Label', () => {
  it('should track color changes', () => {
    const { client } = createTestClient();
    const label = client.materialize(Label, { id: 'lb1', color: null, name: 'Bug' });

    label.color = 'red';

    expect(label.changes()).toEqual({ color: 'red' });
  });
});

describe('Checklist', () => {
  it('should add an item without disturbing other changes', async () => {
    const { client, transport } = createTestClient();
    transport.replyJson({ id: 'i1', name: 'Write tests', state: 'incomplete', idChecklist: 'k1' });
    const checklist = client.materialize(Checklist, { id: 'k1', name: 'Release', checkItems: [] });
    checklist.name = 'Release 2';

    const item = await checklist.addItem('Write tests');

    expect(item).toEqual({ id: 'i1', name: 'Write tests', state: 'incomplete' });
    expect(checklist.items).toEqual([item]);
    expect(checklist.dirtyFields).toEqual(['name']);
    expect(transport.calls).toEqual(['POST /1/checklists/k1/checkItems']);
    expect(transport.lastRequest?.body).toEqual({
      name: 'Write tests',
      checked: false,
      pos: 'bottom',
    });
  });

  it('should reject a malformed item', async () => {
    const { client, transport } = createTestClient();
    transport.replyJson({ id: 'i1' });
    const checklist = client.materialize(Checklist, { id: 'k1' });

    await expect(checklist.addItem('Write tests', true, 'top')).rejects.toThrow(
      'Invalid check item in Trello response',
    );
    expect(transport.lastRequest?.body).toEqual({ name: 'Write tests', checked: true, pos: 'top' });
  });

  it('should delete an item', async () => {
    const { client, transport } = createTestClient();
    transport.replyJson({});
    const checklist = client.materialize(Checklist, {
      id: 'k1',
      checkItems: [
        { id: 'i1', name: 'One', state: 'complete' },
        { id: 'i2', name: 'Two', state: 'incomplete' },
      ],
    });

    await checklist.deleteItem('i1');

    expect(transport.calls).toEqual(['DELETE /1/checklists/k1/checkItems/i1']);
    expect(checklist.items.map((entry) => entry.id)).toEqual(['i2']);
    expect(checklist.isDirty).toBe(false);
  });
});

describe('CustomField', () => {
  it('should list the custom fields of a board', async () => {
    const { client, transport } = createTestClient();
    transport.replyJson([
      {
        id: 'f1',
        idModel: 'b1',
        modelType: 'board',
        name: 'Estimate',
        type: 'number',
        display: { cardFront: true },
      },
    ]);
    const board = client.materialize(Board, { id: 'b1' });

    const fields = await board.customFields;

    expect(fields[0]?.name).toBe('Estimate');
    expect(fields[0]?.type).toBe('number');
    expect(fields[0]?.showsOnCardFront).toBe(true);
    expect(transport.calls).toEqual(['GET /1/boards/b1/customFields']);
  });

  it('should add and delete options without disturbing other changes', async () => {
    const { client, transport } = createTestClient();
    transport.replyJson(
      { id: 'o2', idCustomField: 'f1', value: { text: 'High' }, color: 'red', pos: 2048 },
      {},
    );
    const field = client.materialize(CustomField, {
      id: 'f1',
      name: 'Priority',
      type: 'list',
      options: [{ id: 'o1', value: { text: 'Low' } }],
    });
    field.name = 'Urgency';

    const option = await field.addOption('High', 'red');

    expect(option).toEqual({ id: 'o2', idCustomField: 'f1', value: { text: 'High' }, color: 'red', pos: 2048 });
    expect(field.option('High')?.id).toBe('o2');
    expect(transport.lastRequest?.body).toEqual({ value: { text: 'High' }, color: 'red', pos: 'bottom' });

    await field.deleteOption('o1');

    expect(field.options.map((entry) => entry.id)).toEqual(['o2']);
    expect(field.dirtyFields).toEqual(['name']);
    expect(transport.calls).toEqual([
      'POST /1/customFields/f1/options',
      'DELETE /1/customFields/f1/options/o1',
    ]);
  });

  it('should reject a malformed option', async () => {
    const { client, transport } = createTestClient();
    transport.replyJson({ id: 'o2' });
    const field = client.materialize(CustomField, { id: 'f1', type: 'list' });

    await expect(field.addOption('High')).rejects.toThrow('Invalid custom field option in Trello response');
    expect(field.options).toEqual([]);
  });
});

describe('CustomFieldItem', () => {
  it('should read typed values and resolve its field', async () => {
    const { client, transport } = createTestClient();
    transport.replyJson(
      [
        { id: 'v1', idCustomField: 'f1', idModel: 'c1', modelType: 'card', value: { number: '3.5' } },
        { id: 'v2', idCustomField: 'f2', idModel: 'c1', modelType: 'card', value: { checked: 'true' } },
        { id: 'v3', idCustomField: 'f3', idModel: 'c1', modelType: 'card', value: null, idValue: 'o1' },
        {
          id: 'v4',
          idCustomField: 'f4',
          idModel: 'c1',
          modelType: 'card',
          value: { date: '2026-03-04T05:06:07.000Z' },
        },
      ],
      { id: 'f1', name: 'Estimate', type: 'number' },
    );
    const card = client.materialize(Card, { id: 'c1' });

    const items = await card.customFieldItems;
    const field = await items[0]?.customField;

    expect(items[0]).toBeInstanceOf(CustomFieldItem);
    expect(items[0]?.number).toBe(3.5);
    expect(items[1]?.isChecked).toBe(true);
    expect(items[2]?.optionId).toBe('o1');
    expect(items[2]?.text).toBeUndefined();
    expect(items[3]?.date?.toISOString()).toBe('2026-03-04T05:06:07.000Z');
    expect(field?.name).toBe('Estimate');
    expect(transport.calls).toEqual(['GET /1/cards/c1/customFieldItems', 'GET /1/customFields/f1']);
  });
});

describe('Action', () => {
  it('should edit comment text', async () => {
    const { client, transport } = createTestClient();
    transport.replyJson({ id: 'a1', type: 'commentCard', data: { text: 'Edited' } });
    const action = client.materialize(Action, {
      id: 'a1',
      type: 'commentCard',
      data: { text: 'Original' },
    });

    await action.editText('Edited');

    expect(action.text).toBe('Edited');
    expect(transport.calls).toEqual(['PUT /1/actions/a1']);
    expect(transport.lastRequest?.body).toEqual({ text: 'Edited' });
  });

  it('should resolve its creator through the foreign key', async () => {
    const { client, transport } = createTestClient();
    transport.replyJson({ id: 'm1', fullName: 'Test Member' });
    const action = client.materialize(Action, { id: 'a1', idMemberCreator: 'm1' });

    const creator = await action.memberCreator;

    expect(creator?.fullName).toBe('Test Member');
    expect(transport.calls).toEqual(['GET /1/members/m1']);
  });
});

describe('Notification', () => {
  it('should mark itself as read', async () => {
    const { client, transport } = createTestClient();
    transport.replyJson({ id: 'n1', unread: false });
    const notification = client.materialize(Notification, { id: 'n1', unread: true });

    await notification.markAsRead();

    expect(notification.isUnread).toBe(false);
    expect(transport.calls).toEqual(['PUT /1/notifications/n1']);
    expect(transport.lastRequest?.body).toEqual({ unread: false });
  });
});

describe('Webhook', () => {
  it('should be created and deactivated', async () => {
    const { client, transport } = createTestClient();
    transport.replyJson(
      { id: 'w1', idModel: 'b1', callbackURL: 'https://hooks.example.com/trello', active: true },
      { id: 'w1', active: false },
    );

    const webhook = await client.create(Webhook, {
      description: 'sync',
      idModel: 'b1',
      callbackURL: 'https://hooks.example.com/trello',
    });
    await webhook.deactivate();

    expect(transport.calls).toEqual(['POST /1/webhooks', 'PUT /1/webhooks/w1']);
    expect(transport.requests[0]?.body).toEqual({
      description: 'sync',
      idModel: 'b1',
      callbackURL: 'https://hooks.example.com/trello',
    });
    expect(transport.requests[1]?.body).toEqual({ active: false });
    expect(webhook.isActive).toBe(false);
  });

  it('should reject a malformed callback URL', () => {
    const { client } = createTestClient();

    expect(() => new Webhook(client, { callbackURL: 'not a url' })).toThrow(ValidationError);
  });
});

describe('Token', () => {
  it('should resolve its member', async () => {
    const { client, transport } = createTestClient();
    transport.replyJson({ id: 'm1', username: 'tester' });
    const token = client.materialize(Token, {
      id: 't1',
      identifier: 'Trellis',
      idMember: 'm1',
      dateExpires: null,
      permissions: [{ idModel: '*', modelType: 'Board', read: true, write: false }],
    });

    const member = await token.member;

    expect(member.username).toBe('tester');
    expect(token.expiresAt).toBeUndefined();
    expect(token.permissions[0]?.write).toBe(false);
    expect(transport.calls).toEqual(['GET /1/members/m1']);
  });
});
