import request from 'supertest';
import { DUPLICATE_USERNAME_MESSAGE, INVALID_LOGIN_MESSAGE } from '../src/services/auth.service';
import { PASSWORD_MISMATCH_MESSAGE } from '../src/validators/auth.validators';
import { TEST_PASSWORD, buildTestApp } from './support/testApp';
import type { TestContext } from './support/testApp';

describe('Account routes (e2e)', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = buildTestApp();
  });

  describe('POST /register', () => {
    it('creates a member account', async () => {
      const response = await request(ctx.app)
        .post('/register')
        .send({ username: 'new.reader', password1: 'long-enough', password2: 'long-enough' })
        .expect(201);

      expect(response.body.user).toMatchObject({
        username: 'new.reader',
        role: 'member',
        permissions: [],
      });
      expect(await ctx.repositories.users.existsByUsername('new.reader')).toBe(true);
    });

    it('rejects a taken username', async () => {
      const response = await request(ctx.app)
        .post('/register')
        .send({ username: 'reader', password1: 'long-enough', password2: 'long-enough' })
        .expect(422);

      expect(response.body.errors).toEqual({ username: [DUPLICATE_USERNAME_MESSAGE] });
    });

    it('rejects mismatched passwords', async () => {
      const response = await request(ctx.app)
        .post('/register')
        .send({ username: 'new.reader', password1: 'long-enough', password2: 'not-the-same' })
        .expect(422);

      expect(response.body.errors).toEqual({ password2: [PASSWORD_MISMATCH_MESSAGE] });
    });
  });

  describe('POST /login', () => {
    it('issues an access token cookie', async () => {
      const response = await request(ctx.app)
        .post('/login')
        .send({ username: 'reader', password: TEST_PASSWORD })
        .expect(200);

      expect(typeof response.body.accessToken).toBe('string');
      expect(response.body.user).toEqual({
        id: ctx.member.id,
        username: 'reader',
        role: 'member',
        permissions: [],
      });
      expect(response.headers['set-cookie']).toEqual([
        expect.stringMatching(/^accessToken=[^;]+;.*HttpOnly/),
      ]);
    });

    it('lets the cookie authenticate later requests', async () => {
      const login = await request(ctx.app)
        .post('/login')
        .send({ username: 'reader', password: TEST_PASSWORD })
        .expect(200);

      await request(ctx.app)
        .get('/form')
        .set('Cookie', `accessToken=${login.body.accessToken}`)
        .expect(200);
    });

    it('rejects a wrong password', async () => {
      const response = await request(ctx.app)
        .post('/login')
        .send({ username: 'reader', password: 'wrong-password' })
        .expect(401);

      expect(response.body.message).toBe(INVALID_LOGIN_MESSAGE);
    });

    it('rejects an unknown user', async () => {
      await request(ctx.app)
        .post('/login')
        .send({ username: 'nobody', password: TEST_PASSWORD })
        .expect(401);
    });

    it('refuses deactivated accounts', async () => {
      ctx.repositories.users.add({ username: 'retired', password: TEST_PASSWORD, isActive: false });

      const response = await request(ctx.app)
        .post('/login')
        .send({ username: 'retired', password: TEST_PASSWORD })
        .expect(401);

      expect(response.body.message).toBe('This account is inactive.');
    });

    it('requires both fields', async () => {
      const response = await request(ctx.app).post('/login').send({}).expect(422);

      expect(response.body.errors).toEqual({
        username: ['This field is required.'],
        password: ['This field is required.'],
      });
    });
  });

  describe('GET /login', () => {
    it('describes the form to anonymous users', async () => {
      const response = await request(ctx.app).get('/login').expect(200);

      expect(response.body.fields).toEqual(['username', 'password']);
    });

    it('sends signed-in users to the list', async () => {
      const response = await request(ctx.app)
        .get('/login')
        .set('Authorization', ctx.bearer(ctx.member))
        .expect(302);

      expect(response.headers.location).toBe('/list');
    });
  });

  it('clears the cookie on logout', async () => {
    const response = await request(ctx.app)
      .post('/logout')
      .set('Authorization', ctx.bearer(ctx.member))
      .expect(200);

    expect(response.headers['set-cookie']).toEqual([expect.stringMatching(/^accessToken=;/)]);
  });
});

describe('Author routes (e2e)', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = buildTestApp();
  });

  it('lists authors by last name', async () => {
    await ctx.repositories.authors.create({ name: 'Ursula', lastName: 'Le Guin' });
    await ctx.repositories.authors.create({ name: 'Octavia', lastName: 'Butler' });

    const response = await request(ctx.app).get('/authors').expect(200);

    expect(response.body.data.map((a: { fullName: string }) => a.fullName)).toEqual([
      'Octavia Butler',
      'Ursula Le Guin',
    ]);
  });

  it('requires the add permission to create authors', async () => {
    await request(ctx.app)
      .post('/authors')
      .set('Authorization', ctx.bearer(ctx.member))
      .send({ name: 'Ted', lastName: 'Chiang' })
      .expect(403);
  });

  it('creates an author', async () => {
    const response = await request(ctx.app)
      .post('/authors')
      .set('Authorization', ctx.bearer(ctx.editor))
      .send({ name: 'Ted', lastName: 'Chiang' })
      .expect(201);

    expect(response.body.data).toMatchObject({ name: 'Ted', lastName: 'Chiang', fullName: 'Ted Chiang' });
  });

  it('reports missing names', async () => {
    const response = await request(ctx.app)
      .post('/authors')
      .set('Authorization', ctx.bearer(ctx.admin))
      .send({ name: 'Ted' })
      .expect(422);

    expect(response.body.errors).toEqual({ lastName: ['This field is required.'] });
  });
});
