import type { Session } from '../lib/auth.js';
import * as billing from '../lib/resources/billing.js';
import * as organizations from '../lib/resources/organizations.js';
import * as products from '../lib/resources/products.js';
import * as subscriptions from '../lib/resources/subscriptions.js';
import * as tenants from '../lib/resources/tenants.js';
import * as users from '../lib/resources/users.js';
import { buildSubscription } from '../lib/schemas.js';
import type { ApiResult } from '../types/api.js';
import { BASE, installFetch, jsonResponse, sessionWithToken } from './helpers.js';

const originalFetch = globalThis.fetch;

afterEach(() => {
  globalThis.fetch = originalFetch;
});

type Case = [string, (s: Session) => Promise<ApiResult<unknown>>, string, string];

const cases: Case[] = [
  ['me', (s) => users.me(s), 'GET', '/Me'],
  ['getOrganizations', (s) => organizations.getOrganizations(s), 'GET', '/Organizations'],
  ['getOrganization', (s) => organizations.getOrganization(s, 42), 'GET', '/Organizations/42'],
  [
    'getOrganizationSalesContact',
    (s) => organizations.getOrganizationSalesContact(s, 42),
    'GET',
    '/Organizations/42/salescontact',
  ],
  [
    'getOrganizationHasAccess',
    (s) => organizations.getOrganizationHasAccess(s, 42),
    'GET',
    '/Organizations/HasAccess/42',
  ],
  [
    'getOrganizationAccessGrant',
    (s) => organizations.getOrganizationAccessGrant(s),
    'GET',
    '/OrganizationAccess/grant',
  ],
  ['getAddresses', (s) => organizations.getAddresses(s, 42), 'GET', '/organizations/42/Addresses'],
  [
    'getAddress',
    (s) => organizations.getAddress(s, 42, 7),
    'GET',
    '/organizations/42/Addresses/7',
  ],
  [
    'getActivityLogs',
    (s) => organizations.getActivityLogs(s, 42, { Page: 2 }),
    'GET',
    '/ActivityLogs?Id=42&Page=2',
  ],
  [
    'getAgreementProducts',
    (s) => products.getAgreementProducts(s, 42, { 'Include.ProductFamilyNames': 'Office 365' }),
    'GET',
    '/AgreementProducts?OrganizationId=42&Include.ProductFamilyNames=Office+365',
  ],
  [
    'getSupportedBillingCycles',
    (s) => products.getSupportedBillingCycles(s, 'CFQ7TTC0LH16:0001'),
    'GET',
    '/AgreementProducts/CFQ7TTC0LH16%3A0001/supportedbillingcycles',
  ],
  ['getAgreements', (s) => products.getAgreements(s), 'GET', '/Agreements'],
  ['getAgreementReports', (s) => products.getAgreementReports(s, 5), 'GET', '/AgreementReports/5'],
  [
    'getProductContainerShoppingCart',
    (s) => products.getProductContainerShoppingCart(s, 42),
    'GET',
    '/ProductContainers/getorcreateshoppingcart?OrganizationId=42',
  ],
  [
    'getProductContainerRowIssues',
    (s) => products.getProductContainerRowIssues(s, 5),
    'GET',
    '/ProductContainers/rowissues/5',
  ],
  [
    'patchProductContainerRow',
    (s) => products.patchProductContainerRow(s, 5, 6, { Quantity: 2 }),
    'PATCH',
    '/ProductContainers/5/row/6',
  ],
  ['deleteProductContainer', (s) => products.deleteProductContainer(s, 5), 'DELETE', '/ProductContainers/5'],
  ['getPublishers', (s) => products.getPublishers(s), 'GET', '/publishers'],
  ['getPublisher', (s) => products.getPublisher(s, 2), 'GET', '/publishers/2'],
  ['getProgram', (s) => products.getProgram(s, 3), 'GET', '/Programs/3'],
  ['getRegionByCode', (s) => products.getRegionByCode(s, 'US'), 'GET', '/Regions/bycode?regionCode=US'],
  [
    'deleteResellerSalesPrices',
    (s) => products.deleteResellerSalesPrices(s, 'obj-1'),
    'DELETE',
    '/ResellerSalesPrices?objectID=obj-1',
  ],
  ['getBillingCycles', (s) => billing.getBillingCycles(s), 'GET', '/BillingCycles?includeUnknown=false'],
  [
    'getProductVariantBillingCycles',
    (s) => billing.getProductVariantBillingCycles(s, 11),
    'GET',
    '/BillingCycles/productVariant/11',
  ],
  [
    'getBillingCyclesNameDictionary',
    (s) => billing.getBillingCyclesNameDictionary(s),
    'GET',
    '/BillingCycles/cspNameDictionary',
  ],
  [
    'getGroupedBillingStatements',
    (s) => billing.getGroupedBillingStatements(s, 42),
    'GET',
    '/BillingStatements/grouped?OrganizationId=42',
  ],
  [
    'getBillingStatementExcel',
    (s) => billing.getBillingStatementExcel(s, 9),
    'GET',
    '/BillingStatements/file/9',
  ],
  [
    'getBillingStatementCsv',
    (s) => billing.getBillingStatementCsv(s, 9),
    'GET',
    '/BillingStatements/9/reconciliationfile',
  ],
  [
    'getBillingStatementJson',
    (s) => billing.getBillingStatementJson(s, 9),
    'GET',
    '/BillingStatements/9/billingrecordsfile',
  ],
  ['getInvoiceProfiles', (s) => billing.getInvoiceProfiles(s, 42), 'GET', '/InvoiceProfiles?OrganizationId=42'],
  ['deleteInvoiceProfile', (s) => billing.deleteInvoiceProfile(s, 8), 'DELETE', '/InvoiceProfiles/8'],
  [
    'getUsageCost',
    (s) => billing.getUsageCost(s, 42, { From: '2024-01-01', To: '2024-01-31' }),
    'GET',
    '/UsageCost/organization/42?From=2024-01-01&To=2024-01-31',
  ],
  ['getGroupings', (s) => billing.getGroupings(s, 42), 'GET', '/Groupings?OrganizationId=42'],
  ['deleteGrouping', (s) => billing.deleteGrouping(s, 4), 'DELETE', '/Groupings/4'],
  ['getConsumers', (s) => billing.getConsumers(s, 42), 'GET', '/Consumers?OrganizationId=42'],
  ['deleteConsumer', (s) => billing.deleteConsumer(s, 4), 'DELETE', '/Consumers/4'],
  ['getCrayonAccounts', (s) => billing.getCrayonAccounts(s, 42), 'GET', '/CrayonAccounts?OrganizationId=42'],
  ['getCrayonAccount', (s) => billing.getCrayonAccount(s, 4), 'GET', '/CrayonAccounts/4'],
  [
    'getCustomerTenants',
    (s) => tenants.getCustomerTenants(s, 42, { Search: 'contoso' }),
    'GET',
    '/CustomerTenants?OrganizationId=42&Search=contoso',
  ],
  ['getCustomerTenantDetails', (s) => tenants.getCustomerTenantDetails(s, 3), 'GET', '/CustomerTenants/3/detailed'],
  ['getCustomerTenantAzurePlan', (s) => tenants.getCustomerTenantAzurePlan(s, 3), 'GET', '/CustomerTenants/3/AzurePlan'],
  [
    'getCustomerTenantAgreements',
    (s) => tenants.getCustomerTenantAgreements(s, 3, 1),
    'GET',
    '/CustomerTenants/3/Agreements?AgreementTypeConsent=1',
  ],
  ['deleteCustomerTenant', (s) => tenants.deleteCustomerTenant(s, 3), 'DELETE', '/CustomerTenants/3'],
  ['getAzurePlan', (s) => subscriptions.getAzurePlan(s, 12), 'GET', '/AzurePlans/12'],
  [
    'getAzureSubscriptions',
    (s) => subscriptions.getAzureSubscriptions(s, 12),
    'GET',
    '/AzurePlans/12/azureSubscriptions',
  ],
  [
    'renameAzureSubscription',
    (s) => subscriptions.renameAzureSubscription(s, 12, 34, { friendlyName: 'dev' }),
    'PATCH',
    '/AzurePlans/12/azureSubscriptions/34/rename',
  ],
  ['deleteSubscriptionTag', (s) => subscriptions.deleteSubscriptionTag(s, 77), 'DELETE', '/Subscriptions/77/tags'],
  ['deleteAssetTag', (s) => subscriptions.deleteAssetTag(s, 78), 'DELETE', '/Assets/78/tags'],
  ['getUsers', (s) => users.getUsers(s), 'GET', '/Users'],
  ['getUser', (s) => users.getUser(s, 15), 'GET', '/Users/15'],
  [
    'getUserByName',
    (s) => users.getUserByName(s, 'admin@example.com'),
    'GET',
    '/Users/user?userName=admin%40example.com',
  ],
  ['deleteUser', (s) => users.deleteUser(s, 15), 'DELETE', '/Users/15'],
  ['getClient', (s) => users.getClient(s, 'abc'), 'GET', '/Clients/abc'],
  ['createClient', (s) => users.createClient(s, { ClientName: 'ci' }), 'POST', '/Clients'],
  ['updateClient', (s) => users.updateClient(s, 'abc', { ClientName: 'ci' }), 'PUT', '/Clients/abc'],
  ['deleteClient', (s) => users.deleteClient(s, 'abc'), 'DELETE', '/Clients/abc'],
  ['createSecret', (s) => users.createSecret(s, { ClientId: 'abc' }), 'POST', '/Secrets'],
  [
    'deleteSecret',
    (s) => users.deleteSecret(s, 'abc', 'def'),
    'DELETE',
    '/Secrets?clientID=abc&secretID=def',
  ],
  ['getGroupedManagementLinks', (s) => users.getGroupedManagementLinks(s), 'GET', '/ManagementLinks/grouped'],
  ['getBlogItems', (s) => users.getBlogItems(s), 'GET', '/BlogItems'],
];

describe('resource accessors', () => {
  it.each(cases)('%s issues %s %s', async (_name, call, method, path) => {
    const mock = installFetch(() => jsonResponse({}));

    const result = await call(sessionWithToken());

    expect(result.ok).toBe(true);
    expect(mock).toHaveBeenCalledTimes(1);
    expect(mock.mock.calls[0][0]).toBe(`${BASE}${path}`);
    expect(mock.mock.calls[0][1]?.method).toBe(method);
  });

  it('getOrganization(42) returns the organization', async () => {
    installFetch(() => jsonResponse({ Id: 42, Name: 'Contoso' }));

    const result = await organizations.getOrganization(sessionWithToken(), 42);

    expect(result).toEqual({ ok: true, data: { Id: 42, Name: 'Contoso' } });
  });

  it('encodes path segments taken from parameters', async () => {
    const mock = installFetch(() => jsonResponse({}));

    await users.getClient(sessionWithToken(), 'a/b c');

    expect(mock.mock.calls[0][0]).toBe(`${BASE}/Clients/a%2Fb%20c`);
  });

  it('lets a filter override a fixed parameter', async () => {
    const mock = installFetch(() => jsonResponse({}));

    await products.getProductContainers(sessionWithToken(), 42, { OrganizationId: 43 });

    expect(mock.mock.calls[0][0]).toBe(`${BASE}/ProductContainers?OrganizationId=43`);
  });

  it('createTenantAgreement posts to the tenant agreements path', async () => {
    const mock = installFetch(() => jsonResponse({ agreementType: 1 }));
    const body = {
      firstName: 'First',
      lastName: 'Last',
      phoneNumber: '5555555555',
      email: 'email@example.com',
      dateAgreed: '2024-01-05T09:03:07',
      agreementType: 1,
    };

    await tenants.createTenantAgreement(sessionWithToken(), 1234, body);

    expect(mock).toHaveBeenCalledWith(
      `${BASE}/customertenants/1234/agreements`,
      expect.objectContaining({ method: 'POST', body: JSON.stringify(body) }),
    );
  });

  it('createSubscription posts the subscription body', async () => {
    const mock = installFetch(() => jsonResponse({ id: 1 }));
    const body = buildSubscription({
      name: 'Exchange Online',
      tenantId: 1234,
      partNumber: 'CFQ7TTC0LH16:0001',
      quantity: 5,
      billingCycle: 2,
      termDuration: 'P1Y',
    });

    await subscriptions.createSubscription(sessionWithToken(), body);

    expect(mock).toHaveBeenCalledWith(
      `${BASE}/Subscriptions`,
      expect.objectContaining({ method: 'POST', body: JSON.stringify(body) }),
    );
  });

  it('delete accessors return the status code', async () => {
    installFetch(() => jsonResponse(true));

    const result = await tenants.deleteCustomerTenant(sessionWithToken(), 3);

    expect(result).toEqual({ ok: true, data: 200 });
  });
});
