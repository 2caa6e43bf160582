import request from 'supertest';
import { INestApplication } from '@nestjs/common';
import {
  API_PREFIX,
  createTestApp,
  expectClientError,
  login,
  seedCatalog,
} from './e2e-utils';

jest.setTimeout(30000);

describe('Sales flow (e2e)', () => {
  let app: INestApplication;
  let token: string;
  let productId: string;

  beforeAll(async () => {
    app = await createTestApp();
    token = await login(app);
    ({ productId } = await seedCatalog(app, token));
  });

  afterAll(async () => {
    await app.close();
  });

  const authReq = (
    method: 'get' | 'post' | 'put' | 'delete',
    path: string,
    bearer = token,
  ) =>
    request(app.getHttpServer())
      [method](`${API_PREFIX}${path}`)
      .set('authorization', `Bearer ${bearer}`);

  it('serves the health check without a token', async () => {
    const res = await request(app.getHttpServer())
      .get(`${API_PREFIX}/health`)
      .expect(200);
    expect(res.body).toEqual({ status: 'ok' });
  });

  it('rejects requests without a token', async () => {
    const res = await request(app.getHttpServer())
      .get(`${API_PREFIX}/products`)
      .expect(401);
    expect(res.body.errorCode).toBe('UNAUTHORIZED');
  });

  it('prices products with gst and logs opening stock', async () => {
    const product = await authReq('get', `/products/${productId}`).expect(200);
    expect(product.body).toMatchObject({ id: '001', mrp: 118, quantity: 10 });

    const logs = await authReq('get', `/stock/logs?productId=${productId}`).expect(
      200,
    );
    expect(logs.body.items).toEqual([
      expect.objectContaining({
        changeType: 'IN',
        quantity: 10,
        reason: 'Opening stock',
        changedBy: 'admin',
      }),
    ]);
  });

  it('rejects a flat discount above the line subtotal', async () => {
    const res = await authReq('post', '/cart/lines')
      .send({ productId, quantity: 1, discountType: 'Flat', discountValue: 500 })
      .expect(400);
    expect(res.body).toMatchObject({
      errorCode: 'VALIDATION_ERROR',
      details: { field: 'discountValue' },
    });

    const cart = await authReq('get', '/cart').expect(200);
    expect(cart.body.lines).toEqual([]);
  });

  it('sells, returns one unit and refuses to over-refund', async () => {
    const cart = await authReq('post', '/cart/lines')
      .send({ productId, quantity: 3, discountType: 'Percent', discountValue: 10 })
      .expect(201);
    expect(cart.body.subtotal).toBe(318.6);

    const checkout = await authReq('post', '/cart/checkout')
      .send({ customer: { type: 'WALK_IN' } })
      .expect(201);
    expect(checkout.body.sale).toMatchObject({
      id: 1,
      soldBy: 'admin',
      customerName: 'Walk-in',
      subtotal: 318.6,
      grandTotal: 318.6,
    });
    expect(checkout.body.invoice.invoiceNo).toMatch(/^1-\d{14}$/);
    expect(checkout.body.delivery).toEqual({ status: 'NOT_REQUESTED' });

    const emptied = await authReq('get', '/cart').expect(200);
    expect(emptied.body.lines).toEqual([]);

    const afterSale = await authReq('get', `/products/${productId}`).expect(200);
    expect(afterSale.body.quantity).toBe(7);

    const refund = await authReq('post', '/sales/1/returns')
      .send({ reason: 'damaged', items: [{ productId, quantity: 1 }] })
      .expect(201);
    expect(refund.body.refundTotal).toBe(106.2);
    expect(refund.body.sale.grandTotal).toBe(212.4);
    expect(refund.body.sale.lines[0]).toMatchObject({
      refundedQuantity: 1,
      effectiveTotal: 212.4,
      status: 'PARTIALLY_REFUNDED',
    });

    const afterReturn = await authReq('get', `/products/${productId}`).expect(200);
    expect(afterReturn.body.quantity).toBe(8);

    const overRefund = await authReq('post', '/sales/1/returns')
      .send({ reason: 'damaged', items: [{ productId, quantity: 3 }] })
      .expect(409);
    expect(overRefund.body).toMatchObject({
      errorCode: 'OVER_REFUND',
      details: { productId, sold: 3, alreadyRefunded: 1, requested: 3 },
    });

    const logs = await authReq('get', `/stock/logs?productId=${productId}`).expect(
      200,
    );
    expect(
      logs.body.items.map(
        (item: { changeType: string; quantity: number }) =>
          `${item.changeType}:${item.quantity}`,
      ),
    ).toEqual(['IN:1', 'OUT:3', 'IN:10']);
  });

  it('creates a new customer at checkout and skips e-mail when delivery is not configured', async () => {
    await authReq('post', '/cart/lines').send({ productId, quantity: 1 }).expect(201);

    const checkout = await authReq('post', '/cart/checkout')
      .send({
        customer: { type: 'NEW', name: 'Asha Rao', email: 'asha.rao@gmail.com' },
      })
      .expect(201);
    expect(checkout.body.sale.customerName).toBe('Asha Rao');
    expect(checkout.body.delivery).toMatchObject({
      status: 'SKIPPED',
      recipient: 'asha.rao@gmail.com',
    });

    const customers = await authReq('get', '/customers?search=Asha').expect(200);
    expect(customers.body.items).toHaveLength(1);
  });

  it('refuses to delete a product that has been sold', async () => {
    await authReq('delete', `/products/${productId}`).expect(409);
  });

  it('serves the invoice as a PDF', async () => {
    const res = await authReq('get', '/sales/1/invoice.pdf').expect(200);
    expect(res.headers['content-type']).toBe('application/pdf');
  });

  it('restricts supplier management to admins', async () => {
    const employee = await authReq('post', '/employees')
      .send({
        name: 'Ravi Kumar',
        phone: '9876500002',
        email: 'ravi.k@gmail.com',
        role: 'Employee',
        joinDate: '2024-01-15',
      })
      .expect(201);

    const credentials = await authReq(
      'post',
      `/employees/${employee.body.id}/login`,
    ).expect(201);
    expect(credentials.body).toEqual({
      username: 'ravikumar',
      role: 'Employee',
      password: 'rav123',
    });

    const employeeToken = await login(app, 'ravikumar', 'rav123');
    await authReq('get', '/suppliers', employeeToken).expect(403);
    await authReq('get', '/products', employeeToken).expect(200);
  });

  it('rejects malformed supplier phones', async () => {
    await authReq('post', '/suppliers')
      .send({ name: 'Bad Phone', company: 'Acme', phone: '12345' })
      .expect(expectClientError);
  });

  it('invalidates the token on logout', async () => {
    const sessionToken = await login(app);
    await authReq('post', '/auth/logout', sessionToken).expect(201);
    await authReq('get', '/auth/me', sessionToken).expect(401);
  });
});
