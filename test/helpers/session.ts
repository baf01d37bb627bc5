import request from 'supertest';
import { Application } from 'express';

export interface Account {
  username: string;
  key: string;
  token: string;
}

/** Registers through the API and logs in, returning the generated credentials and a bearer token. */
export const signUp = async (app: Application, email: string): Promise<Account> => {
  const created = await request(app).post('/create-user/').send({ email }).expect(201);
  const username: string = created.body.username;
  const key: string = created.body.key;

  const login = await request(app).post('/token').type('form').send({ username, password: key }).expect(200);
  return { username, key, token: login.body.access_token };
};

export const bearer = (account: Pick<Account, 'token'>): string => `Bearer ${account.token}`;
