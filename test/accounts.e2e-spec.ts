import request from 'supertest';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { AUTH, createTestApp } from './utils/test-app';

describe('Accounts and contacts (e2e)', () => {
  let app: NestExpressApplication;

  beforeAll(async () => {
    ({ app } = await createTestApp());
  });

  afterAll(async () => {
    if (app) {
      await app.close();
    }
  });

  const createAccount = async (body: Record<string, unknown>) =>
    request(app.getHttpServer())
      .post('/api/accounts')
      .set(AUTH)
      .send(body)
      .expect(201);

  describe('authentication', () => {
    it('/api/accounts (GET) - Missing token', async () => {
      const response = await request(app.getHttpServer())
        .get('/api/accounts')
        .expect(401);

      expect(response.headers['www-authenticate']).toBe('Bearer');
    });

    it('/api/accounts (GET) - Wrong token', async () => {
      await request(app.getHttpServer())
        .get('/api/accounts')
        .set('Authorization', 'Bearer not-the-token')
        .expect(401);
    });

    it('/health (GET) - Open', async () => {
      const response = await request(app.getHttpServer())
        .get('/health')
        .expect(200);

      expect(response.body).toEqual({
        status: 'ok',
        database: 'up',
        circuits: {},
      });
    });
  });

  describe('accounts', () => {
    it('/api/accounts (POST) - Success', async () => {
      const response = await createAccount({
        name: 'Acme',
        industry: 'Technology',
      });

      expect(response.body).toMatchObject({
        name: 'Acme',
        industry: 'Technology',
        website: null,
        notes: null,
        enrichmentState: 'ready',
      });
      expect(response.body).toHaveProperty('id');
      expect(response.body).not.toHaveProperty('enrichmentRequestId');
    });

    it('/api/accounts (POST) - Validation Error', async () => {
      await request(app.getHttpServer())
        .post('/api/accounts')
        .set(AUTH)
        .send({ industry: 'Technology' })
        .expect(400);

      await request(app.getHttpServer())
        .post('/api/accounts')
        .set(AUTH)
        .send({ name: 'Bad Industry Inc', industry: 'Space Mining' })
        .expect(400);
    });

    it('/api/accounts/:id (PUT) - Partial update keeps other fields', async () => {
      const created = await createAccount({
        name: 'Globex',
        industry: 'Energy',
        website: 'https://globex.test',
      });
      const id: number = created.body.id;

      const response = await request(app.getHttpServer())
        .put(`/api/accounts/${id}`)
        .set(AUTH)
        .send({ notes: 'Renewal in March' })
        .expect(200);

      expect(response.body).toMatchObject({
        id,
        name: 'Globex',
        industry: 'Energy',
        website: 'https://globex.test',
        notes: 'Renewal in March',
        enrichmentState: 'ready',
      });
    });

    it('/api/accounts/:id (GET) - Unknown id', async () => {
      await request(app.getHttpServer())
        .get('/api/accounts/9999')
        .set(AUTH)
        .expect(404);
    });

    it('/api/accounts/search (GET) - Matches name case-insensitively', async () => {
      await createAccount({ name: 'Initech Solutions' });

      const response = await request(app.getHttpServer())
        .get('/api/accounts/search')
        .query({ q: 'INITECH' })
        .set(AUTH)
        .expect(200);

      expect(response.body.total).toBe(1);
      expect(response.body.accounts[0].name).toBe('Initech Solutions');
    });

    it('/api/accounts/search (GET) - Short query matches nothing', async () => {
      const response = await request(app.getHttpServer())
        .get('/api/accounts/search')
        .query({ q: 'ac' })
        .set(AUTH)
        .expect(200);

      expect(response.body).toEqual({
        accounts: [],
        total: 0,
        page: 1,
        page_size: 20,
        total_pages: 0,
      });
    });

    it('/api/accounts (GET) - Pages results', async () => {
      const response = await request(app.getHttpServer())
        .get('/api/accounts')
        .query({ page_size: 1, sort_by: 'name', sort_order: 'asc' })
        .set(AUTH)
        .expect(200);

      expect(response.body.accounts).toHaveLength(1);
      expect(response.body.accounts[0].name).toBe('Acme');
      expect(response.body.page_size).toBe(1);
      expect(response.body.total_pages).toBe(response.body.total);
    });
  });

  describe('contacts', () => {
    it('/api/contacts (POST) - Unknown account', async () => {
      const response = await request(app.getHttpServer())
        .post('/api/contacts')
        .set(AUTH)
        .send({ account_id: 9999, first_name: 'Jane', last_name: 'Doe' })
        .expect(400);

      expect(response.body.message).toBe('Account 9999 does not exist');
    });

    it('/api/contacts/:id (PUT) - Unknown account', async () => {
      const created = await request(app.getHttpServer())
        .post('/api/contacts')
        .set(AUTH)
        .send({ first_name: 'Sam', last_name: 'Lee' })
        .expect(201);

      await request(app.getHttpServer())
        .put(`/api/contacts/${created.body.id}`)
        .set(AUTH)
        .send({ account_id: 9999 })
        .expect(400);
    });

    it('/api/accounts/:id (DELETE) - Keeps contacts unassigned', async () => {
      const account = await createAccount({ name: 'Umbrella' });
      const accountId: number = account.body.id;

      const contact = await request(app.getHttpServer())
        .post('/api/contacts')
        .set(AUTH)
        .send({
          account_id: accountId,
          first_name: 'Alice',
          last_name: 'Marsh',
          email: 'alice@umbrella.test',
        })
        .expect(201);

      const listed = await request(app.getHttpServer())
        .get(`/api/accounts/${accountId}/contacts`)
        .set(AUTH)
        .expect(200);
      expect(listed.body).toHaveLength(1);

      await request(app.getHttpServer())
        .delete(`/api/accounts/${accountId}`)
        .set(AUTH)
        .expect(204);

      const response = await request(app.getHttpServer())
        .get(`/api/contacts/${contact.body.id}`)
        .set(AUTH)
        .expect(200);

      expect(response.body).toMatchObject({
        firstName: 'Alice',
        lastName: 'Marsh',
        accountId: null,
      });
    });

    it('/api/contacts/search (GET) - Matches the account name', async () => {
      const account = await createAccount({ name: 'Hooli' });
      await request(app.getHttpServer())
        .post('/api/contacts')
        .set(AUTH)
        .send({
          account_id: account.body.id,
          first_name: 'Gavin',
          last_name: 'Belson',
        })
        .expect(201);

      const response = await request(app.getHttpServer())
        .get('/api/contacts/search')
        .query({ q: 'hooli' })
        .set(AUTH)
        .expect(200);

      expect(response.body.total).toBe(1);
      expect(response.body.contacts[0]).toMatchObject({
        firstName: 'Gavin',
        accountName: 'Hooli',
      });
    });

    it('/api/contacts/:id/logs (POST, GET) - Lists newest first', async () => {
      const contact = await request(app.getHttpServer())
        .post('/api/contacts')
        .set(AUTH)
        .send({ first_name: 'Monica', last_name: 'Hall' })
        .expect(201);
      const logsUrl = `/api/contacts/${contact.body.id}/logs`;

      const created = await request(app.getHttpServer())
        .post(logsUrl)
        .set(AUTH)
        .send({ subject: 'Intro call', contact_type: 'call' })
        .expect(201);
      expect(created.body).toMatchObject({
        contactId: contact.body.id,
        subject: 'Intro call',
        contactType: 'call',
        notes: null,
      });

      await request(app.getHttpServer())
        .post(logsUrl)
        .set(AUTH)
        .send({ subject: 'Sent pricing', contact_type: 'email', notes: 'Tier 2' })
        .expect(201);

      const response = await request(app.getHttpServer())
        .get(logsUrl)
        .set(AUTH)
        .expect(200);

      expect(
        response.body.map((log: { subject: string }) => log.subject),
      ).toEqual(['Sent pricing', 'Intro call']);
    });

    it('/api/contacts/:id/logs (POST) - Validation Error', async () => {
      const contact = await request(app.getHttpServer())
        .post('/api/contacts')
        .set(AUTH)
        .send({ first_name: 'Jared', last_name: 'Dunn' })
        .expect(201);

      await request(app.getHttpServer())
        .post(`/api/contacts/${contact.body.id}/logs`)
        .set(AUTH)
        .send({ subject: 'No type given' })
        .expect(400);
    });

    it('/api/contacts/:id/logs (GET) - Unknown contact', async () => {
      await request(app.getHttpServer())
        .get('/api/contacts/9999/logs')
        .set(AUTH)
        .expect(404);

      await request(app.getHttpServer())
        .post('/api/contacts/9999/logs')
        .set(AUTH)
        .send({ subject: 'Intro call', contact_type: 'call' })
        .expect(404);
    });
  });
});
