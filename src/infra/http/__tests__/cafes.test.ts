import { describe, it, expect, beforeEach } from 'vitest';
import request from 'supertest';
import type { DbPool } from '../../db/pool.js';
import { buildTestApp, createCafe, register, type Agent, type TestApp } from './testApp.js';

describe('Cafe pages', () => {
  let app: TestApp['app'];
  let pool: DbPool;
  let alice: Agent;
  let bob: Agent;

  beforeEach(async () => {
    ({ app, pool } = await buildTestApp());
    // Alice registers first and becomes the super-admin (id 1)
    alice = request.agent(app);
    bob = request.agent(app);
    await register(alice, 'a@x.com', 'pw1', 'Alice');
    await register(bob, 'b@x.com', 'pw2', 'Bob');
  });

  async function cafeCount(): Promise<number> {
    const result = await pool.query('SELECT id FROM cafes');
    return result.rows.length;
  }

  describe('GET /', () => {
    it('should be readable anonymously', async () => {
      const res = await request(app).get('/');

      expect(res.status).toBe(200);
      expect(res.text).toContain('<p class="empty">No cafes yet.</p>');
    });

    it('should list cafes in the order they were added', async () => {
      await createCafe(alice, { name: 'Zebra Coffee' });
      await createCafe(bob, { name: 'Aardvark Brews' });

      const res = await request(app).get('/');

      expect(res.text.indexOf('Zebra Coffee')).toBeLessThan(res.text.indexOf('Aardvark Brews'));
    });
  });

  describe('POST /new-cafe', () => {
    it('should reject a rating of 11 and list nothing', async () => {
      const res = await createCafe(alice, { name: "Joe's", rating: '11' });

      expect(res.status).toBe(400);
      expect(res.text).toContain(
        '<p class="field-error" data-field="rating">Rating must be between 1 and 10.</p>'
      );
      expect(res.text).toContain('value="Joe&#39;s"');

      const home = await request(app).get('/');
      expect(home.text).toContain('<p class="empty">No cafes yet.</p>');
    });

    it("should list a rated cafe under the contributor's name", async () => {
      const res = await createCafe(alice, { name: "Joe's", rating: '7' });

      expect(res.status).toBe(302);
      expect(res.headers.location).toBe('/');

      const home = await request(app).get('/');
      expect(home.text).toContain('<h2><a href="/cafe/1">Joe&#39;s</a></h2>');
      expect(home.text).toContain(
        '<p class="meta">Rated 7/10 by Alice on October 05, 2026</p>'
      );
    });

    it.each([
      ['0', 400],
      ['1', 302],
      ['10', 302],
      ['11', 400],
    ])('should answer rating %s with %i', async (rating, status) => {
      const res = await createCafe(bob, { rating });

      expect(res.status).toBe(status);
      expect(await cafeCount()).toBe(status === 302 ? 1 : 0);
    });

    it('should reject a malformed image url', async () => {
      const res = await createCafe(bob, { imgUrl: 'not a url' });

      expect(res.status).toBe(400);
      expect(res.text).toContain(
        '<p class="field-error" data-field="imgUrl">Enter a valid URL.</p>'
      );
      expect(await cafeCount()).toBe(0);
    });

    it('should keep an explicit contributor name', async () => {
      await createCafe(bob, { contributorName: 'Robert' });

      const home = await request(app).get('/');
      expect(home.text).toContain('<p class="meta">Rated 7/10 by Robert on October 05, 2026</p>');
    });

    it('should flash a name collision and return to the form', async () => {
      await createCafe(alice, {});

      const res = await createCafe(bob, {});

      expect(res.status).toBe(302);
      expect(res.headers.location).toBe('/new-cafe');
      const form = await bob.get('/new-cafe');
      expect(form.text).toContain('<p class="flash">A cafe with that name already exists.</p>');
      expect(await cafeCount()).toBe(1);
    });

    it('should send anonymous visitors to the login page', async () => {
      const res = await request(app).post('/new-cafe').type('form').send({ name: 'Sneaky' });

      expect(res.status).toBe(302);
      expect(res.headers.location).toBe('/login');
      expect(await cafeCount()).toBe(0);
    });
  });

  describe('GET /cafe/:id', () => {
    beforeEach(async () => {
      await createCafe(alice, { name: "Joe's" });
    });

    it('should show an existing cafe to anonymous visitors', async () => {
      const res = await request(app).get('/cafe/1');

      expect(res.status).toBe(200);
      expect(res.text).toContain("<h1>Joe&#39;s</h1>");
      expect(res.text).toContain('<div class="body">Friendly staff and strong coffee.</div>');
    });

    it('should answer 404 for an unknown cafe', async () => {
      const res = await request(app).get('/cafe/99');

      expect(res.status).toBe(404);
      expect(res.text).toContain('<p class="error-message">Cafe not found</p>');
    });

    it('should answer 404 for a non-numeric id', async () => {
      const res = await request(app).get('/cafe/latte');

      expect(res.status).toBe(404);
    });
  });

  describe('POST /cafe/:id', () => {
    beforeEach(async () => {
      await createCafe(alice, {});
    });

    async function commentCount(): Promise<number> {
      const result = await pool.query('SELECT id FROM comments');
      return result.rows.length;
    }

    it('should store a comment from a signed-in user', async () => {
      const res = await bob.post('/cafe/1').type('form').send({ text: 'Lovely flat white' });

      expect(res.status).toBe(302);
      expect(res.headers.location).toBe('/cafe/1');

      const page = await request(app).get('/cafe/1');
      expect(page.text).toContain('<p class="comment-text">Lovely flat white</p>');
      expect(page.text).toContain('<p class="comment-author">Bob</p>');
    });

    it('should drop a valid anonymous comment and ask for a login', async () => {
      const visitor = request.agent(app);

      const res = await visitor.post('/cafe/1').type('form').send({ text: 'Drive-by' });

      expect(res.status).toBe(302);
      expect(res.headers.location).toBe('/login');
      expect(await commentCount()).toBe(0);

      const page = await visitor.get('/login');
      expect(page.text).toContain('<p class="flash">You need to login or register to comment.</p>');
    });

    it('should redisplay an empty comment without storing it', async () => {
      const res = await request(app).post('/cafe/1').type('form').send({ text: '  ' });

      expect(res.status).toBe(400);
      expect(res.text).toContain(
        '<p class="field-error" data-field="text">Comment is required.</p>'
      );
      expect(await commentCount()).toBe(0);
    });

    it('should answer 404 when commenting on an unknown cafe', async () => {
      const res = await bob.post('/cafe/99').type('form').send({ text: 'Hello?' });

      expect(res.status).toBe(404);
      expect(await commentCount()).toBe(0);
    });
  });

  describe('GET/POST /edit-cafe/:id', () => {
    beforeEach(async () => {
      // Cafe 1 belongs to Bob
      await createCafe(bob, {});
    });

    it('should prefill the form for the contributor', async () => {
      const res = await bob.get('/edit-cafe/1');

      expect(res.status).toBe(200);
      expect(res.text).toContain('<input id="name" name="name" value="Bean There">');
      expect(res.text).toContain(
        '<input id="rating" name="rating" type="number" min="1" max="10" value="7">'
      );
    });

    it('should save the contributor changes and show the cafe', async () => {
      const res = await bob
        .post('/edit-cafe/1')
        .type('form')
        .send({ name: 'Bean Here', summary: 'Still great', rating: '9', body: 'New roaster.' });

      expect(res.status).toBe(302);
      expect(res.headers.location).toBe('/cafe/1');

      const page = await request(app).get('/cafe/1');
      expect(page.text).toContain('<h1>Bean Here</h1>');
      expect(page.text).toContain('<p class="meta">Rated 9/10 by Bob on October 05, 2026</p>');
    });

    it('should let the super-admin edit any cafe', async () => {
      const res = await alice
        .post('/edit-cafe/1')
        .type('form')
        .send({ name: 'Bean There', summary: 'Reviewed', rating: '5', body: 'Checked by admin.' });

      expect(res.status).toBe(302);
      const result = await pool.query('SELECT rating FROM cafes WHERE id = 1');
      expect(result.rows[0].rating).toBe(5);
    });

    it('should forbid other users', async () => {
      const carol = request.agent(app);
      await register(carol, 'c@x.com', 'pw3', 'Carol');

      const form = await carol.get('/edit-cafe/1');
      const submit = await carol
        .post('/edit-cafe/1')
        .type('form')
        .send({ name: 'Hijacked', summary: 'x', rating: '1', body: 'x' });

      expect(form.status).toBe(403);
      expect(submit.status).toBe(403);
      const result = await pool.query('SELECT name FROM cafes WHERE id = 1');
      expect(result.rows[0].name).toBe('Bean There');
    });

    it('should flash a rename onto another cafe and return to the form', async () => {
      await createCafe(alice, { name: 'Other Place' });

      const res = await bob
        .post('/edit-cafe/1')
        .type('form')
        .send({ name: 'Other Place', summary: 'x', rating: '6', body: 'x' });

      expect(res.status).toBe(302);
      expect(res.headers.location).toBe('/edit-cafe/1');
      const form = await bob.get('/edit-cafe/1');
      expect(form.text).toContain('<p class="flash">A cafe with that name already exists.</p>');
      const result = await pool.query('SELECT name FROM cafes WHERE id = 1');
      expect(result.rows[0].name).toBe('Bean There');
    });

    it('should answer 404 for an id beyond the serial range', async () => {
      const res = await bob.get('/edit-cafe/99999999999');

      expect(res.status).toBe(404);
    });

    it('should redisplay an invalid edit', async () => {
      const res = await bob
        .post('/edit-cafe/1')
        .type('form')
        .send({ name: 'Bean There', summary: 'x', rating: '0', body: 'x' });

      expect(res.status).toBe(400);
      expect(res.text).toContain(
        '<p class="field-error" data-field="rating">Rating must be between 1 and 10.</p>'
      );
    });
  });

  describe('GET /delete/:id', () => {
    beforeEach(async () => {
      await createCafe(alice, {});
      await bob.post('/cafe/1').type('form').send({ text: 'Nice' });
    });

    it('should forbid a user who is not the super-admin', async () => {
      const res = await bob.get('/delete/1');

      expect(res.status).toBe(403);
      expect(res.text).toContain(
        '<p class="error-message">You do not have permission to access this page.</p>'
      );
      expect((await request(app).get('/cafe/1')).status).toBe(200);
    });

    it('should forbid anonymous visitors', async () => {
      const res = await request(app).get('/delete/1');

      expect(res.status).toBe(403);
      expect(await cafeCount()).toBe(1);
    });

    it('should delete the cafe and its comments for the super-admin', async () => {
      const res = await alice.get('/delete/1');

      expect(res.status).toBe(302);
      expect(res.headers.location).toBe('/');

      const home = await request(app).get('/');
      expect(home.text).toContain('<p class="empty">No cafes yet.</p>');
      const comments = await pool.query('SELECT id FROM comments');
      expect(comments.rows).toHaveLength(0);
    });

    it('should answer 404 for an unknown cafe', async () => {
      const res = await alice.get('/delete/99');

      expect(res.status).toBe(404);
    });
  });
});
