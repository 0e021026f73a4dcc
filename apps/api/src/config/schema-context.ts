// Chinook Database Schema Context for AI prompts

export const SCHEMA_CONTEXT = `
Database Schema:
- customers: CustomerId, FirstName, LastName, Company, Address, City, State, Country, PostalCode, Phone, Fax, Email, SupportRepId
- invoices: InvoiceId, CustomerId, InvoiceDate, BillingAddress, BillingCity, BillingState, BillingCountry, BillingPostalCode, Total
- invoice_items: InvoiceLineId, InvoiceId, TrackId, UnitPrice, Quantity
- tracks: TrackId, Name, AlbumId, MediaTypeId, GenreId, Composer, Milliseconds, Bytes, UnitPrice
- albums: AlbumId, Title, ArtistId
- artists: ArtistId, Name
- genres: GenreId, Name
- media_types: MediaTypeId, Name
- playlists: PlaylistId, Name
- playlist_track: PlaylistId, TrackId
- employees: EmployeeId, LastName, FirstName, Title, ReportsTo, BirthDate, HireDate, Address, City, State, Country, PostalCode, Phone, Fax, Email
`;

export const getSchemaContext = (): string => SCHEMA_CONTEXT;
