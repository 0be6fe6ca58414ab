beforeEach(() => {
  vi.clearAllMocks();
});
