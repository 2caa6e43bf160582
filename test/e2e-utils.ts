import './test-env';
import { INestApplication } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import request from 'supertest';
import { AppModule } from '../src/app.module';
import { configureApp } from '../src/app.setup';

export const API_PREFIX = '/api/v1';
export const ADMIN_USERNAME = 'admin';
export const ADMIN_PASSWORD = 'test-password-1';

export type CatalogFixtures = {
  supplierId: string;
  productId: string;
};

export const createTestApp = async () => {
  const moduleFixture: TestingModule = await Test.createTestingModule({
    imports: [AppModule],
  }).compile();

  const app = moduleFixture.createNestApplication();
  configureApp(app);
  await app.init();

  return app;
};

export const expectClientError = (res: { status: number }) => {
  if (res.status < 400 || res.status >= 500) {
    throw new Error(`Expected 4xx response, got ${res.status}`);
  }
};

export const login = async (
  app: INestApplication,
  username = ADMIN_USERNAME,
  password = ADMIN_PASSWORD,
) => {
  const res = await request(app.getHttpServer())
    .post(`${API_PREFIX}/auth/login`)
    .send({ username, password })
    .expect((response) => {
      if (response.status >= 400) {
        throw new Error(`Login failed with ${response.status}`);
      }
    });
  const { accessToken } = res.body as { accessToken: string };
  return accessToken;
};

export const seedCatalog = async (
  app: INestApplication,
  token: string,
): Promise<CatalogFixtures> => {
  const supplierRes = await request(app.getHttpServer())
    .post(`${API_PREFIX}/suppliers`)
    .set('authorization', `Bearer ${token}`)
    .send({
      name: 'Meena Traders',
      company: 'Meena Wholesale',
      phone: '9876500001',
      email: 'meena.supply@gmail.com',
    })
    .expect((res) => {
      if (res.status >= 400) {
        throw new Error(`Supplier create failed with ${res.status}`);
      }
    });

  const productRes = await request(app.getHttpServer())
    .post(`${API_PREFIX}/products`)
    .set('authorization', `Bearer ${token}`)
    .send({
      name: 'Basmati Rice 1kg',
      category: 'Grocery',
      supplierId: supplierRes.body.id,
      quantity: 10,
      costPrice: 80,
      unitPrice: 100,
      gst: 18,
      reorderLevel: 3,
    })
    .expect((res) => {
      if (res.status >= 400) {
        throw new Error(`Product create failed with ${res.status}`);
      }
    });

  return {
    supplierId: supplierRes.body.id,
    productId: productRes.body.id,
  };
};
